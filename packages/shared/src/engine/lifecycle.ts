import type { GameState, Rng } from '../types.js';
import { dealCard, shuffleDeck } from '../deck.js';
import { GameRuleError } from './errors.js';
import { cloneState, findSeat, getContenders, canAct } from './participants.js';
import { findNextActor, isHandInProgress } from './gameEngine.js';
import { awardUncontestedPot, resolveShowdown } from './showdown.js';

export interface RemovedParticipant {
  playerId: string;
  chips: number;
  reason: 'left' | 'busted';
}

export interface CompleteHandResult {
  state: GameState;
  removed: RemovedParticipant[];
}

export function countPlayersWithChips(state: GameState): number {
  return state.participants.filter(p => p.chips > 0 && !p.leaving).length;
}

export function canStartHand(state: GameState): boolean {
  return !isHandInProgress(state) && state.tableWinnerId === null && countPlayersWithChips(state) >= 2;
}

/**
 * Collects antes, shuffles and deals one card to every participant still in.
 *
 * A stack smaller than the ante goes in whole and the player is folded for the
 * hand; if every stack is short they all play all-in instead. The previous
 * winner acts first (seat 0 on the first hand), skipping anyone who cannot act.
 * When nobody can act the hand goes straight to showdown, and a single
 * remaining contender wins the antes outright.
 */
export function startNewHand(state: GameState, rng: Rng = Math.random): GameState {
  if (isHandInProgress(state) || state.tableWinnerId !== null) {
    throw new GameRuleError('INVALID_PHASE', `Cannot start a hand while ${state.phase}`);
  }
  if (countPlayersWithChips(state) < 2) {
    throw new GameRuleError('NOT_ENOUGH_PLAYERS', 'At least two players with chips are needed');
  }

  const next = cloneState(state);
  const { ante } = next.rules;
  next.handNumber += 1;
  next.pot = 0;
  next.handResult = null;
  next.actionLog = [];

  const payers = next.participants.filter(p => p.chips > 0 && !p.leaving);
  const everyoneShort = payers.every(p => p.chips < ante);

  for (const p of next.participants) {
    p.card = null;
    p.currentBet = 0;
    p.folded = false;
    p.allIn = false;
    p.lastAction = 'none';
    p.sittingOut = false;

    if (p.chips === 0 || p.leaving) {
      p.folded = true;
      continue;
    }

    const paid = Math.min(ante, p.chips);
    p.chips -= paid;
    p.currentBet = paid;
    next.pot += paid;
    if (paid < ante && !everyoneShort) {
      p.folded = true;
    } else if (p.chips === 0) {
      p.allIn = true;
    }
  }

  const contenders = getContenders(next);
  next.currentBet = Math.max(0, ...contenders.map(p => p.currentBet));

  next.deck = shuffleDeck(next.rules.deck, rng);
  for (const p of contenders) {
    const { card, deck } = dealCard(next.deck, next.rules.deck, rng);
    p.card = card;
    next.deck = deck;
  }

  next.phase = 'betting';
  next.currentTurn = -1;

  if (contenders.length === 1) {
    return awardUncontestedPot(next);
  }

  const winnerSeat = next.lastWinnerId === null ? -1 : findSeat(next, next.lastWinnerId);
  const startSeat = winnerSeat === -1 ? 0 : winnerSeat;
  const first = canAct(next.participants[startSeat])
    ? startSeat
    : findNextActor(next, startSeat);

  if (first === -1) {
    return resolveShowdown(next, rng);
  }
  next.currentTurn = first;
  return next;
}

/**
 * Clears the settled hand, removes leavers and busted players, and either
 * ends the table (one player holds every chip), starts the next hand, or
 * waits for more players.
 * @param autoStart when false the table is left in 'waiting' instead of dealing
 */
export function completeHand(state: GameState, rng: Rng = Math.random, autoStart: boolean = true): CompleteHandResult {
  if (state.phase !== 'finished' || state.tableWinnerId !== null) {
    throw new GameRuleError('INVALID_PHASE', 'No settled hand to complete');
  }

  const next = cloneState(state);
  const removed: RemovedParticipant[] = [];

  next.participants = next.participants.filter(p => {
    if (!p.leaving && p.chips > 0) return true;
    removed.push({ playerId: p.id, chips: p.chips, reason: p.leaving ? 'left' : 'busted' });
    next.totalChips -= p.chips;
    return false;
  });

  for (const p of next.participants) {
    p.card = null;
    p.currentBet = 0;
    p.folded = false;
    p.allIn = false;
    p.lastAction = 'none';
    p.sittingOut = false;
  }
  next.currentBet = 0;
  next.currentTurn = -1;
  next.pot = 0;

  const champion = next.participants.find(p => p.chips === next.totalChips);
  if (champion && next.totalChips > 0) {
    next.tableWinnerId = champion.id;
    return { state: next, removed };
  }

  next.phase = 'waiting';
  if (autoStart && canStartHand(next)) {
    return { state: startNewHand(next, rng), removed };
  }
  return { state: next, removed };
}
