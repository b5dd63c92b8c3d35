import type { Action, GameState, LastAction, Rank } from '../types.js';
import type { GameErrorCode } from './errors.js';
import type { RemovedParticipant } from './lifecycle.js';

// ======== GameCommand: engine input ========

export type GameCommand =
  | { type: 'JOIN'; playerId: string; name: string }
  | { type: 'LEAVE'; playerId: string }
  | { type: 'START_HAND' }
  | { type: 'PLAYER_ACTION'; playerId: string; action: Action; amount?: number };

// ======== GameEvent: engine output ========

export type GameEvent =
  | { type: 'PLAYER_JOINED'; playerId: string; seatIndex: number; chips: number; sittingOut: boolean }
  | { type: 'HAND_STARTED'; handNumber: number; ante: number; pot: number; firstToActId: string | null }
  // every dealt card; the host must never show a player their own
  | { type: 'CARDS_DEALT'; handNumber: number; cards: Record<string, Rank> }
  | { type: 'ACTION_TAKEN'; playerId: string; action: LastAction; amount: number }
  | { type: 'FOLD_PENALTY'; playerId: string; amount: number }
  | { type: 'TIE_REDRAW'; round: number; cards: Record<string, Rank> }
  | { type: 'SHOWDOWN_RESULT'; winnerId: string; amount: number; cards: Record<string, Rank>; refunds: Record<string, number> }
  | { type: 'HAND_FINISHED'; handNumber: number; winnerId: string; amount: number; byFold: boolean }
  | ({ type: 'PLAYER_REMOVED' } & RemovedParticipant)
  | { type: 'TABLE_FINISHED'; winnerId: string; chips: number };

export interface CommandError {
  code: GameErrorCode;
  message: string;
}

// ======== processCommand result ========

export interface CommandResult {
  state: GameState;
  events: GameEvent[];
  error?: CommandError;
}
