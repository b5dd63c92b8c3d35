export * from './types.js';
export * from './deck.js';
export * from './cards.js';
export * from './rules.js';
export * from './engine/index.js';
