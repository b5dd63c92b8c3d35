// GameState -> client payloads (static methods)

import { getPlayerView, isHandInProgress, type GameState } from '@indian-poker/shared';
import type { ClientGameState, TableInfo, TableSummary } from '../../../shared/types/websocket.js';

export class StateTransformer {
  /**
   * State as one viewer sees it: every card but their own.
   * A null viewer gets every card and must not be a seated player.
   */
  static toClientGameState(tableId: string, state: GameState, viewerId: string | null): ClientGameState {
    return {
      tableId,
      variant: state.rules.variant,
      ante: state.rules.ante,
      isHandInProgress: isHandInProgress(state),
      ...getPlayerView(state, viewerId),
    };
  }

  static toTableInfo(tableId: string, state: GameState): TableInfo {
    return {
      id: tableId,
      name: `Table ${tableId.slice(0, 4)}`,
      variant: state.rules.variant,
      ante: state.rules.ante,
      startingStack: state.rules.startingStack,
      players: state.participants.length,
      maxPlayers: state.rules.maxPlayers,
      phase: state.phase,
      handNumber: state.handNumber,
      isFinished: state.tableWinnerId !== null,
    };
  }

  /** Lobby detail for anyone, seated or not, so no card is included. */
  static toTableSummary(tableId: string, state: GameState): TableSummary {
    const view = getPlayerView(state, null);
    return {
      ...this.toTableInfo(tableId, state),
      pot: view.pot,
      currentBet: view.currentBet,
      currentTurnPlayerId: view.currentTurnPlayerId,
      tableWinnerId: view.tableWinnerId,
      participants: view.participants.map(p => ({
        id: p.id,
        name: p.name,
        seatIndex: p.seatIndex,
        chips: p.chips,
        currentBet: p.currentBet,
        folded: p.folded,
        allIn: p.allIn,
        sittingOut: p.sittingOut,
        lastAction: p.lastAction,
      })),
    };
  }
}
