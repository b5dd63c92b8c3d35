import type { GameState, Participant, Rank } from '../types.js';
import { GameEngineError } from './errors.js';

export function cloneState(state: GameState): GameState {
  return structuredClone(state);
}

export function findSeat(state: GameState, playerId: string): number {
  return state.participants.findIndex(p => p.id === playerId);
}

/** Participants still contesting the pot. */
export function getContenders(state: GameState): Participant[] {
  return state.participants.filter(p => !p.folded);
}

export function canAct(p: Participant): boolean {
  return !p.folded && !p.allIn;
}

/** Chips the participant must add to match the table's current bet. */
export function amountToCall(state: GameState, p: Participant): number {
  return Math.max(0, state.currentBet - p.currentBet);
}

export function requireCard(p: Participant): Rank {
  if (p.card === null) {
    throw new GameEngineError('MISSING_CARD', `Participant ${p.id} reached showdown without a card`);
  }
  return p.card;
}

/**
 * Moves chips from the stack into the pot. Marks the participant all-in
 * when the stack is emptied.
 */
export function commitChips(state: GameState, p: Participant, amount: number): void {
  p.chips -= amount;
  p.currentBet += amount;
  state.pot += amount;
  if (p.chips === 0) p.allIn = true;
}
