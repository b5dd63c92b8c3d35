import type { GameState, HandResult, Participant, Rank, Rng } from '../types.js';
import { dealCard } from '../deck.js';
import { findLeaders } from '../cards.js';
import { GameEngineError } from './errors.js';
import { cloneState, getContenders, requireCard } from './participants.js';

// Far beyond anything a real deck produces; only a degenerate rank set gets here.
export const MAX_TIE_REDRAWS = 1000;

function cardsOf(participants: Participant[]): Record<string, Rank> {
  const cards: Record<string, Rank> = {};
  for (const p of participants) cards[p.id] = requireCard(p);
  return cards;
}

function closeHand(state: GameState, winner: Participant, result: Omit<HandResult, 'handNumber' | 'winnerId'>): GameState {
  state.handResult = { handNumber: state.handNumber, winnerId: winner.id, ...result };
  state.lastWinnerId = winner.id;
  state.phase = 'finished';
  state.currentTurn = -1;
  return state;
}

/**
 * Everyone else folded: the last contender takes the whole pot, no cards compared.
 * Mutates and returns `state`.
 */
export function awardUncontestedPot(state: GameState): GameState {
  const [winner] = getContenders(state);
  if (!winner) {
    throw new GameEngineError('NO_VALID_WINNER', 'No participant left to award the pot to');
  }
  const amount = state.pot;
  winner.chips += amount;
  state.pot = 0;
  return closeHand(state, winner, { amount, refunds: {}, byFold: true, cards: {}, redraws: [] });
}

/**
 * Deals fresh cards to the tied players until exactly one leads.
 * Each redraw round is returned in order; participant cards are updated in place.
 */
function breakTies(state: GameState, tied: string[], rng: Rng): { winnerId: string; redraws: Record<string, Rank>[] } {
  const redraws: Record<string, Rank>[] = [];
  let contenders = tied;

  while (contenders.length > 1) {
    if (redraws.length >= MAX_TIE_REDRAWS) {
      throw new GameEngineError('TIE_UNRESOLVED', `Tie between ${contenders.join(', ')} not broken after ${MAX_TIE_REDRAWS} redraws`);
    }
    const round: Record<string, Rank> = {};
    for (const id of contenders) {
      const { card, deck } = dealCard(state.deck, state.rules.deck, rng);
      state.deck = deck;
      round[id] = card;
      const participant = state.participants.find(p => p.id === id);
      if (participant) participant.card = card;
    }
    redraws.push(round);
    contenders = findLeaders(
      contenders.map(id => ({ id, card: round[id] })),
      state.rules.joker
    );
  }

  return { winnerId: contenders[0], redraws };
}

/**
 * Compares the contenders' cards, redraws ties, then settles the pot.
 * Any commitment above the smallest contender's bet is refunded to its payer
 * before the remainder goes to the winner.
 */
export function resolveShowdown(state: GameState, rng: Rng = Math.random): GameState {
  const next = cloneState(state);
  next.phase = 'showdown';
  next.currentTurn = -1;

  const contenders = getContenders(next);
  if (contenders.length === 0) {
    throw new GameEngineError('NO_VALID_WINNER', 'Showdown reached with no contenders');
  }

  const cards = cardsOf(contenders);
  const leaders = findLeaders(
    contenders.map(p => ({ id: p.id, card: cards[p.id] })),
    next.rules.joker
  );
  const { winnerId, redraws } = breakTies(next, leaders, rng);

  const minContribution = Math.min(...contenders.map(p => p.currentBet));
  const refunds: Record<string, number> = {};
  for (const p of contenders) {
    const excess = p.currentBet - minContribution;
    if (excess > 0) {
      p.chips += excess;
      next.pot -= excess;
      refunds[p.id] = excess;
    }
  }

  const winner = contenders.find(p => p.id === winnerId);
  if (!winner) {
    throw new GameEngineError('NO_VALID_WINNER', `Winner ${winnerId} is not a contender`);
  }
  const amount = next.pot;
  winner.chips += amount;
  next.pot = 0;

  return closeHand(next, winner, { amount, refunds, byFold: false, cards, redraws });
}
