import type { GameRules, Rank } from './types.js';

function range(from: number, to: number): Rank[] {
  return Array.from({ length: to - from + 1 }, (_, i) => from + i);
}

// Two copies of 1–10; folding while showing a 10 costs half the stack.
export const CLASSIC_RULES: GameRules = {
  variant: 'classic',
  deck: { ranks: range(1, 10), copies: 2 },
  joker: null,
  ante: 1,
  startingStack: 20,
  maxPlayers: 6,
  foldPenalty: { rank: 10, fraction: 0.5, rounding: 'up' },
};

// One copy of 1–13 plus a joker (0) that beats only the king.
export const JOKER_RULES: GameRules = {
  variant: 'joker',
  deck: { ranks: [0, ...range(1, 13)], copies: 1 },
  joker: { rank: 0, beats: 13 },
  ante: 1,
  startingStack: 20,
  maxPlayers: 6,
  foldPenalty: { rank: 13, fraction: 0.5, rounding: 'up' },
};

export const VARIANTS = {
  classic: CLASSIC_RULES,
  joker: JOKER_RULES,
} as const;

export type VariantName = keyof typeof VARIANTS;

