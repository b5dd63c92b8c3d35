import type { GameState, LastAction, Phase, Rank, ValidAction } from '../types.js';
import { getValidActions } from './gameEngine.js';

export interface ParticipantView {
  id: string;
  name: string;
  seatIndex: number;
  chips: number;
  currentBet: number;
  folded: boolean;
  allIn: boolean;
  sittingOut: boolean;
  lastAction: LastAction;
  card: Rank | null;
}

export interface PlayerView {
  viewerId: string | null;
  phase: Phase;
  handNumber: number;
  pot: number;
  currentBet: number;
  currentTurnPlayerId: string | null;
  tableWinnerId: string | null;
  participants: ParticipantView[];
  validActions: ValidAction[];
}

/**
 * Read-only snapshot for one viewer. Every card is visible except the viewer's own.
 * Pass `null` for a spectator view with all cards shown; never send that to a seated player.
 */
export function getPlayerView(state: GameState, viewerId: string | null): PlayerView {
  const current = state.currentTurn >= 0 ? state.participants[state.currentTurn] : undefined;
  return {
    viewerId,
    phase: state.phase,
    handNumber: state.handNumber,
    pot: state.pot,
    currentBet: state.currentBet,
    currentTurnPlayerId: state.phase === 'betting' && current ? current.id : null,
    tableWinnerId: state.tableWinnerId,
    participants: state.participants.map((p, seatIndex) => ({
      id: p.id,
      name: p.name,
      seatIndex,
      chips: p.chips,
      currentBet: p.currentBet,
      folded: p.folded,
      allIn: p.allIn,
      sittingOut: p.sittingOut,
      lastAction: p.lastAction,
      card: p.id === viewerId ? null : p.card,
    })),
    validActions: viewerId === null ? [] : getValidActions(state, viewerId),
  };
}
