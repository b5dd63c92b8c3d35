import type { Action, GameRules, GameState, Participant, Rng, ValidAction } from '../types.js';
import { createDeck } from '../deck.js';
import { GameRuleError } from './errors.js';
import {
  cloneState,
  findSeat,
  getContenders,
  canAct,
  amountToCall,
  commitChips,
} from './participants.js';
import { awardUncontestedPot, resolveShowdown } from './showdown.js';

/**
 * Empty table for the given rules. Players are added with {@link seatPlayer}.
 */
export function createInitialGameState(rules: GameRules): GameState {
  return {
    rules,
    participants: [],
    deck: createDeck(rules.deck),
    pot: 0,
    currentBet: 0,
    currentTurn: -1,
    phase: 'waiting',
    totalChips: 0,
    handNumber: 0,
    lastWinnerId: null,
    handResult: null,
    tableWinnerId: null,
    actionLog: [],
  };
}

export function isHandInProgress(state: GameState): boolean {
  return state.phase === 'betting' || state.phase === 'showdown';
}

/**
 * Seats a player with the table's starting stack. A player joining mid-hand
 * sits out (folded, no card) until the next hand is dealt.
 */
export function seatPlayer(state: GameState, playerId: string, name: string): GameState {
  if (state.tableWinnerId !== null) {
    throw new GameRuleError('INVALID_PHASE', 'Table has finished');
  }
  if (findSeat(state, playerId) !== -1) {
    throw new GameRuleError('ALREADY_SEATED', `Player ${playerId} is already seated`);
  }
  if (state.participants.length >= state.rules.maxPlayers) {
    throw new GameRuleError('TABLE_FULL', 'No seat available');
  }

  const next = cloneState(state);
  const inHand = isHandInProgress(next);
  next.participants.push({
    id: playerId,
    name,
    chips: next.rules.startingStack,
    card: null,
    currentBet: 0,
    folded: inHand,
    allIn: false,
    lastAction: 'none',
    sittingOut: inHand,
    leaving: false,
  });
  next.totalChips += next.rules.startingStack;
  return next;
}

/**
 * Result of a leave request. Outside a hand the seat is freed at once and
 * `removedChips` holds the stack to cash out. During a hand the player is
 * folded (or, when all-in, left to the showdown) and removed when the hand
 * settles (`removedChips` is null).
 */
export interface LeaveResult {
  state: GameState;
  removedChips: number | null;
}

export function leaveTable(state: GameState, playerId: string, rng: Rng = Math.random): LeaveResult {
  const seat = findSeat(state, playerId);
  if (seat === -1) {
    throw new GameRuleError('NOT_SEATED', `Player ${playerId} is not seated`);
  }

  if (!isHandInProgress(state)) {
    const next = cloneState(state);
    const [removed] = next.participants.splice(seat, 1);
    next.totalChips -= removed.chips;
    return { state: next, removedChips: removed.chips };
  }

  const next = cloneState(state);
  const player = next.participants[seat];
  player.leaving = true;
  // an all-in player has nothing left to decide and stays in for the showdown
  if (player.folded || player.allIn) {
    return { state: next, removedChips: null };
  }

  const wasCurrentPlayer = next.currentTurn === seat;
  foldParticipant(next, player);
  // the leaver's bet no longer has to be matched
  next.currentBet = Math.max(0, ...getContenders(next).map(p => p.currentBet));
  if (getContenders(next).length === 1) {
    return { state: awardUncontestedPot(next), removedChips: null };
  }
  if (wasCurrentPlayer || !hasPendingActor(next)) {
    return { state: advanceTurn(next, rng), removedChips: null };
  }
  return { state: next, removedChips: null };
}

/**
 * Legal actions for the player, empty when it is not their turn.
 * For a raise the amounts are the increment on top of the call.
 */
export function getValidActions(state: GameState, playerId: string): ValidAction[] {
  const seat = findSeat(state, playerId);
  if (state.phase !== 'betting' || seat === -1 || seat !== state.currentTurn) return [];

  const player = state.participants[seat];
  if (!canAct(player)) return [];

  const actions: ValidAction[] = [{ action: 'fold', minAmount: 0, maxAmount: 0 }];
  const toCall = amountToCall(state, player);

  if (toCall === 0) {
    actions.push({ action: 'check', minAmount: 0, maxAmount: 0 });
    if (player.chips > 0) {
      actions.push({ action: 'bet', minAmount: 1, maxAmount: player.chips });
    }
  } else {
    const callAmount = Math.min(toCall, player.chips);
    actions.push({ action: 'call', minAmount: callAmount, maxAmount: callAmount });
    if (player.chips > toCall) {
      actions.push({ action: 'raise', minAmount: 1, maxAmount: player.chips - toCall });
    }
  }

  return actions;
}

function assertAmount(amount: number): void {
  if (!Number.isInteger(amount) || amount <= 0) {
    throw new GameRuleError('INVALID_AMOUNT', `Amount must be a positive integer, got ${amount}`);
  }
}

function validateAction(state: GameState, seat: number, action: Action, amount: number): void {
  if (state.phase !== 'betting') {
    throw new GameRuleError('INVALID_PHASE', `Cannot ${action} while ${state.phase}`);
  }
  if (seat === -1) {
    throw new GameRuleError('NOT_SEATED', 'Player is not seated');
  }
  if (seat !== state.currentTurn) {
    throw new GameRuleError('NOT_YOUR_TURN', 'Another player is to act');
  }

  const player = state.participants[seat];
  const toCall = amountToCall(state, player);

  switch (action) {
    case 'fold':
      return;
    case 'check':
      if (toCall > 0) throw new GameRuleError('CANNOT_CHECK', `There are ${toCall} chips to call`);
      return;
    case 'call':
      if (toCall === 0) throw new GameRuleError('NOTHING_TO_CALL', 'No bet to call');
      return;
    case 'bet':
      if (toCall > 0) throw new GameRuleError('ILLEGAL_OPEN_BET', 'A bet is already open, raise instead');
      assertAmount(amount);
      if (amount > player.chips) {
        throw new GameRuleError('INSUFFICIENT_CHIPS', `Bet of ${amount} exceeds stack of ${player.chips}`);
      }
      return;
    case 'raise':
      if (toCall === 0) throw new GameRuleError('ILLEGAL_OPEN_BET', 'Nothing to raise, bet instead');
      assertAmount(amount);
      if (toCall + amount > player.chips) {
        throw new GameRuleError(
          'INSUFFICIENT_CHIPS',
          `Raise needs ${toCall + amount} chips, stack is ${player.chips}`
        );
      }
      return;
    default: {
      const unknown: never = action;
      throw new GameRuleError('UNKNOWN_ACTION', `Unknown action ${String(unknown)}`);
    }
  }
}

/**
 * Everyone else still able to act has to respond to the new bet.
 * Shared by bet and raise so the reset is identical for both.
 */
function reopenAction(state: GameState, aggressor: Participant): void {
  for (const p of state.participants) {
    if (p.id !== aggressor.id && canAct(p)) {
      p.lastAction = 'none';
    }
  }
}

export function computeFoldPenalty(state: GameState, player: Participant): number {
  const rule = state.rules.foldPenalty;
  if (!rule || player.card !== rule.rank || player.chips <= 0) return 0;
  const raw = player.chips * rule.fraction;
  const penalty = rule.rounding === 'up' ? Math.ceil(raw) : Math.floor(raw);
  return Math.min(Math.max(penalty, 0), player.chips);
}

/** Folds in place, charging the penalty when the player shows the penalty rank. */
function foldParticipant(state: GameState, player: Participant): void {
  const penalty = computeFoldPenalty(state, player);
  if (penalty > 0) {
    player.chips -= penalty;
    state.pot += penalty;
  }
  player.folded = true;
  player.lastAction = 'fold';
  state.actionLog.push({
    playerId: player.id,
    action: 'fold',
    amount: 0,
    ...(penalty > 0 ? { penalty } : {}),
  });
}

/** True while some participant able to act has not acted since the last bet or raise. */
export function hasPendingActor(state: GameState): boolean {
  return state.participants.some(p => canAct(p) && p.lastAction === 'none');
}

/**
 * First pending actor after `fromIndex`, scanning at most one full circuit
 * (so `fromIndex` itself is checked last). -1 when nobody is pending.
 */
export function findNextActor(state: GameState, fromIndex: number): number {
  const n = state.participants.length;
  let index = fromIndex;
  for (let step = 0; step < n; step++) {
    index = (index + 1 + n) % n;
    const p = state.participants[index];
    if (canAct(p) && p.lastAction === 'none') return index;
  }
  return -1;
}

/**
 * Hands the turn to the next pending actor, or closes the round and
 * resolves the showdown when nobody is pending.
 */
function advanceTurn(state: GameState, rng: Rng): GameState {
  const nextIndex = hasPendingActor(state) ? findNextActor(state, state.currentTurn) : -1;
  if (nextIndex === -1) {
    return resolveShowdown(state, rng);
  }
  state.currentTurn = nextIndex;
  return state;
}

/**
 * Applies a betting action for the player whose turn it is.
 * Throws {@link GameRuleError} without touching `state` when the action is illegal.
 * @param amount bet size, or for a raise the increment on top of the call
 * @returns the new state; `phase` is 'finished' when the action ended the hand
 */
export function applyAction(
  state: GameState,
  playerId: string,
  action: Action,
  amount: number = 0,
  rng: Rng = Math.random
): GameState {
  const seat = findSeat(state, playerId);
  validateAction(state, seat, action, amount);

  const next = cloneState(state);
  const player = next.participants[seat];
  const toCall = amountToCall(next, player);

  switch (action) {
    case 'fold':
      foldParticipant(next, player);
      if (getContenders(next).length === 1) {
        return awardUncontestedPot(next);
      }
      return advanceTurn(next, rng);

    case 'check':
      player.lastAction = 'check';
      next.actionLog.push({ playerId, action: 'check', amount: 0 });
      break;

    case 'call': {
      const paid = Math.min(toCall, player.chips);
      commitChips(next, player, paid);
      // a short call leaves the player all-in at their current bet
      player.lastAction = player.allIn ? 'allin' : 'call';
      next.actionLog.push({ playerId, action: player.lastAction, amount: paid });
      break;
    }

    case 'bet':
    case 'raise': {
      const paid = action === 'bet' ? amount : toCall + amount;
      commitChips(next, player, paid);
      next.currentBet = player.currentBet;
      player.lastAction = player.allIn ? 'allin' : action;
      reopenAction(next, player);
      next.actionLog.push({ playerId, action: player.lastAction, amount: paid });
      break;
    }
  }

  return advanceTurn(next, rng);
}
