export * from './gameEngine.js';
export * from './lifecycle.js';
export * from './showdown.js';
export * from './view.js';
export { GameRuleError, GameEngineError } from './errors.js';
export type { GameErrorCode, EngineFailureCode } from './errors.js';
export { processCommand, MAX_CHAINED_HANDS } from './processCommand.js';
export type { ProcessCommandOptions } from './processCommand.js';
export type { GameCommand, GameEvent, CommandResult, CommandError } from './types.js';
