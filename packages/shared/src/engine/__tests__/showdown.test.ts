import { describe, it, expect } from 'vitest';
import { awardUncontestedPot, resolveShowdown } from '../showdown.js';
import { GameEngineError } from '../errors.js';
import { JOKER_RULES } from '../../rules.js';
import { TEST_RULES, bettingState, chipsOnTable, keepOrder, player } from './testHelpers.js';

describe('resolveShowdown', () => {
  it('pays the highest card regardless of seat order', () => {
    const forward = bettingState([
      { id: 'a', chips: 20, card: 8 },
      { id: 'b', chips: 20, card: 3 },
    ]);
    const reversed = bettingState([
      { id: 'b', chips: 20, card: 3 },
      { id: 'a', chips: 20, card: 8 },
    ]);
    expect(resolveShowdown(forward).handResult?.winnerId).toBe('a');
    expect(resolveShowdown(reversed).handResult?.winnerId).toBe('a');
  });

  it('settles the pot and closes the hand', () => {
    const state = resolveShowdown(bettingState([
      { id: 'a', chips: 20, card: 8 },
      { id: 'b', chips: 20, card: 3 },
    ]));
    expect(state.phase).toBe('finished');
    expect(state.currentTurn).toBe(-1);
    expect(state.pot).toBe(0);
    expect(state.lastWinnerId).toBe('a');
    expect(state.handResult).toEqual({
      handNumber: 1,
      winnerId: 'a',
      amount: 2,
      refunds: {},
      byFold: false,
      cards: { a: 8, b: 3 },
      redraws: [],
    });
    expect(player(state, 'a').chips).toBe(21);
  });

  it('ignores folded players when comparing', () => {
    const state = bettingState([
      { id: 'a', chips: 20, card: 10 },
      { id: 'b', chips: 20, card: 3 },
      { id: 'c', chips: 20, card: 2 },
    ]);
    state.participants[0].folded = true;
    const result = resolveShowdown(state).handResult;
    expect(result?.winnerId).toBe('b');
    expect(result?.cards).toEqual({ b: 3, c: 2 });
  });

  it('redraws for the tied players only', () => {
    const state = bettingState([
      { id: 'a', chips: 20, card: 7 },
      { id: 'b', chips: 20, card: 7 },
      { id: 'c', chips: 20, card: 3 },
    ], { deck: { cards: [4, 9], cursor: 0 } });
    const next = resolveShowdown(state);

    expect(next.handResult).toMatchObject({
      winnerId: 'b',
      amount: 3,
      cards: { a: 7, b: 7, c: 3 },
      redraws: [{ a: 4, b: 9 }],
    });
    expect(player(next, 'a').card).toBe(4);
    expect(player(next, 'b').chips).toBe(22);
    expect(next.deck.cursor).toBe(2);
  });

  it('keeps redrawing until a single leader remains', () => {
    const state = bettingState([
      { id: 'a', chips: 20, card: 5 },
      { id: 'b', chips: 20, card: 5 },
      { id: 'c', chips: 20, card: 5 },
    ], { deck: { cards: [9, 9, 1, 3, 2], cursor: 0 } });
    const next = resolveShowdown(state);

    expect(next.handResult?.redraws).toEqual([
      { a: 9, b: 9, c: 1 },
      { a: 3, b: 2 },
    ]);
    expect(next.handResult?.winnerId).toBe('a');
  });

  it('reshuffles an exhausted deck to keep redrawing', () => {
    const state = bettingState([
      { id: 'a', chips: 20, card: 6 },
      { id: 'b', chips: 20, card: 6 },
    ], { deck: { cards: [6], cursor: 1 } });
    const next = resolveShowdown(state, keepOrder);

    expect(next.handResult?.redraws).toEqual([{ a: 1, b: 2 }]);
    expect(next.handResult?.winnerId).toBe('b');
    expect(next.deck.cards).toHaveLength(20);
  });

  it('gives up on a deck that can only tie', () => {
    const rules = { ...TEST_RULES, deck: { ranks: [4], copies: 2 } };
    const state = bettingState([
      { id: 'a', chips: 20, card: 4 },
      { id: 'b', chips: 20, card: 4 },
    ], { rules, deck: { cards: [4, 4], cursor: 0 } });
    expect(() => resolveShowdown(state)).toThrow(GameEngineError);
  });

  it('refunds every contribution above the smallest one', () => {
    const state = bettingState([
      { id: 'a', chips: 20, card: 9 },
      { id: 'b', chips: 20, card: 2 },
      { id: 'c', chips: 20, card: 3 },
    ]);
    Object.assign(state.participants[0], { chips: 0, currentBet: 5, allIn: true });
    Object.assign(state.participants[1], { chips: 9, currentBet: 11 });
    Object.assign(state.participants[2], { chips: 9, currentBet: 11 });
    state.pot = 27;
    state.totalChips = 45;
    state.currentBet = 11;

    const next = resolveShowdown(state);
    expect(next.handResult).toMatchObject({ winnerId: 'a', amount: 15, refunds: { b: 6, c: 6 } });
    expect(player(next, 'a').chips).toBe(15);
    expect(player(next, 'b').chips).toBe(15);
    expect(player(next, 'c').chips).toBe(15);
    expect(chipsOnTable(next)).toBe(45);
  });

  it('fails when no one is left in the hand', () => {
    const state = bettingState([
      { id: 'a', chips: 20, card: 9 },
      { id: 'b', chips: 20, card: 2 },
    ]);
    for (const p of state.participants) p.folded = true;
    expect(() => resolveShowdown(state)).toThrow(GameEngineError);
    expect(() => awardUncontestedPot(state)).toThrow(GameEngineError);
  });
});

describe('joker', () => {
  it('beats the top rank', () => {
    const state = bettingState([
      { id: 'a', chips: 20, card: 0 },
      { id: 'b', chips: 20, card: 13 },
    ], { rules: JOKER_RULES });
    expect(resolveShowdown(state).handResult?.winnerId).toBe('a');
  });

  it('loses to any other rank', () => {
    const state = bettingState([
      { id: 'a', chips: 20, card: 0 },
      { id: 'b', chips: 20, card: 5 },
    ], { rules: JOKER_RULES });
    expect(resolveShowdown(state).handResult?.winnerId).toBe('b');
  });

  it('redraws when the cards beat each other in a circle', () => {
    const state = bettingState([
      { id: 'a', chips: 20, card: 0 },
      { id: 'b', chips: 20, card: 13 },
      { id: 'c', chips: 20, card: 5 },
    ], { rules: JOKER_RULES, deck: { cards: [1, 2, 3], cursor: 0 } });
    const next = resolveShowdown(state);
    expect(next.handResult?.redraws).toEqual([{ a: 1, b: 2, c: 3 }]);
    expect(next.handResult?.winnerId).toBe('c');
  });
});

describe('awardUncontestedPot', () => {
  it('gives the pot to the last player in without a showdown', () => {
    const state = bettingState([
      { id: 'a', chips: 20, card: 9 },
      { id: 'b', chips: 20, card: 2 },
    ]);
    state.participants[0].folded = true;
    const next = awardUncontestedPot(state);
    expect(next.handResult).toMatchObject({ winnerId: 'b', amount: 2, byFold: true });
    expect(player(next, 'b').chips).toBe(21);
  });
});
