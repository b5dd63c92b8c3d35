import type { GameState, Rng } from '../types.js';
import type { GameCommand, GameEvent, CommandResult } from './types.js';
import { GameRuleError } from './errors.js';
import { applyAction, leaveTable, seatPlayer } from './gameEngine.js';
import { completeHand, startNewHand } from './lifecycle.js';

export interface ProcessCommandOptions {
  rng?: Rng;
}

// Hands that settle without any action (everyone all-in from the ante) chain
// into the next one; past this many the table waits for an explicit START_HAND.
export const MAX_CHAINED_HANDS = 100;

/**
 * The engine as a pure function: (State, Command) → (State, Event[]).
 *
 * A rejected command returns the input state untouched, no events and an
 * `error`. Internal consistency failures are thrown.
 */
export function processCommand(
  state: GameState,
  command: GameCommand,
  options?: ProcessCommandOptions
): CommandResult {
  const rng = options?.rng ?? Math.random;
  try {
    switch (command.type) {
      case 'JOIN':
        return handleJoin(state, command);
      case 'LEAVE':
        return handleLeave(state, command, rng);
      case 'START_HAND':
        return handleStartHand(state, rng);
      case 'PLAYER_ACTION':
        return handlePlayerAction(state, command, rng);
      default: {
        const unhandled: never = command;
        throw new Error(`Unhandled command ${JSON.stringify(unhandled)}`);
      }
    }
  } catch (err) {
    if (err instanceof GameRuleError) {
      return { state, events: [], error: { code: err.code, message: err.message } };
    }
    throw err;
  }
}

function handleJoin(state: GameState, command: Extract<GameCommand, { type: 'JOIN' }>): CommandResult {
  const newState = seatPlayer(state, command.playerId, command.name);
  const seatIndex = newState.participants.length - 1;
  const seated = newState.participants[seatIndex];
  return {
    state: newState,
    events: [{
      type: 'PLAYER_JOINED',
      playerId: seated.id,
      seatIndex,
      chips: seated.chips,
      sittingOut: seated.sittingOut,
    }],
  };
}

function handleLeave(state: GameState, command: Extract<GameCommand, { type: 'LEAVE' }>, rng: Rng): CommandResult {
  const { state: afterLeave, removedChips } = leaveTable(state, command.playerId, rng);

  if (removedChips !== null) {
    return {
      state: afterLeave,
      events: [{ type: 'PLAYER_REMOVED', playerId: command.playerId, chips: removedChips, reason: 'left' }],
    };
  }

  const events = actionEvents(state, afterLeave);
  return settleHands(afterLeave, events, rng);
}

function handleStartHand(state: GameState, rng: Rng): CommandResult {
  const newState = startNewHand(state, rng);
  const events: GameEvent[] = [];
  pushHandStart(newState, events);
  return settleHands(newState, events, rng);
}

function handlePlayerAction(
  state: GameState,
  command: Extract<GameCommand, { type: 'PLAYER_ACTION' }>,
  rng: Rng
): CommandResult {
  const { playerId, action, amount = 0 } = command;
  const newState = applyAction(state, playerId, action, amount, rng);
  const events = actionEvents(state, newState);
  return settleHands(newState, events, rng);
}

/** ACTION_TAKEN / FOLD_PENALTY for log entries added between two states of the same hand. */
function actionEvents(before: GameState, after: GameState): GameEvent[] {
  const events: GameEvent[] = [];
  for (const entry of after.actionLog.slice(before.actionLog.length)) {
    events.push({ type: 'ACTION_TAKEN', playerId: entry.playerId, action: entry.action, amount: entry.amount });
    if (entry.penalty) {
      events.push({ type: 'FOLD_PENALTY', playerId: entry.playerId, amount: entry.penalty });
    }
  }
  return events;
}

function pushHandStart(state: GameState, events: GameEvent[]): void {
  const current = state.currentTurn >= 0 ? state.participants[state.currentTurn] : undefined;
  const cards: Record<string, number> = {};
  for (const p of state.participants) {
    if (p.card !== null) cards[p.id] = p.card;
  }
  events.push({
    type: 'HAND_STARTED',
    handNumber: state.handNumber,
    ante: state.rules.ante,
    // a hand that settled during the deal has already paid out its pot
    pot: state.handResult ? state.handResult.amount + sumRefunds(state.handResult.refunds) : state.pot,
    firstToActId: state.phase === 'betting' && current ? current.id : null,
  });
  events.push({ type: 'CARDS_DEALT', handNumber: state.handNumber, cards });
}

function sumRefunds(refunds: Record<string, number>): number {
  return Object.values(refunds).reduce((sum, n) => sum + n, 0);
}

function pushHandResult(state: GameState, events: GameEvent[]): void {
  const result = state.handResult;
  if (!result) return;

  result.redraws.forEach((cards, i) => {
    events.push({ type: 'TIE_REDRAW', round: i + 1, cards });
  });
  if (!result.byFold) {
    events.push({
      type: 'SHOWDOWN_RESULT',
      winnerId: result.winnerId,
      amount: result.amount,
      cards: result.cards,
      refunds: result.refunds,
    });
  }
  events.push({
    type: 'HAND_FINISHED',
    handNumber: result.handNumber,
    winnerId: result.winnerId,
    amount: result.amount,
    byFold: result.byFold,
  });
}

/**
 * While the current hand is settled: report it, clean up, and deal the next
 * one (or finish the table).
 */
function settleHands(state: GameState, events: GameEvent[], rng: Rng): CommandResult {
  let current = state;

  for (let chained = 0; current.phase === 'finished' && current.tableWinnerId === null; chained++) {
    pushHandResult(current, events);

    const { state: completed, removed } = completeHand(current, rng, chained < MAX_CHAINED_HANDS);
    for (const r of removed) {
      events.push({ type: 'PLAYER_REMOVED', ...r });
    }
    current = completed;

    if (current.tableWinnerId !== null) {
      const winnerId = current.tableWinnerId;
      const champion = current.participants.find(p => p.id === winnerId);
      events.push({ type: 'TABLE_FINISHED', winnerId, chips: champion?.chips ?? 0 });
    } else if (current.phase === 'waiting') {
      break;
    } else {
      pushHandStart(current, events);
    }
  }

  return { state: current, events };
}
