// Server -> client WebSocket event types

import type { LastAction, ParticipantView, Phase, PlayerView, Rank, ValidAction } from '@indian-poker/shared';

// Inbound payloads are validated by the zod schemas in modules/game/handlers.ts

// ========== Server -> Client Events ==========

export interface ServerToClientEvents {
  // Connection
  'connection:established': (data: { playerId: string }) => void;

  // Table events
  'table:joined': (data: { tableId: string; seat: number }) => void;
  'table:left': (data: { tableId: string }) => void;
  'table:busted': (data: { tableId: string }) => void;
  'table:player_joined': (data: { playerId: string; name: string; seat: number; chips: number; sittingOut: boolean }) => void;
  'table:player_left': (data: { playerId: string; chips: number; reason: 'left' | 'busted' }) => void;
  'table:finished': (data: { winnerId: string; chips: number }) => void;
  'table:error': (data: { code?: string; message: string }) => void;

  // Game state updates
  'game:state': (data: { state: ClientGameState }) => void;
  'game:hand_started': (data: { handNumber: number; ante: number; pot: number; firstToActId: string | null }) => void;
  // everyone else's card; a player never receives their own
  'game:cards': (data: { handNumber: number; cards: Record<string, Rank> }) => void;
  'game:action_required': (data: { playerId: string; validActions: ValidAction[] }) => void;
  'game:action_taken': (data: { playerId: string; action: LastAction; amount: number }) => void;
  'game:fold_penalty': (data: { playerId: string; amount: number }) => void;
  'game:tie_redraw': (data: { round: number; cards: Record<string, Rank> }) => void;
  'game:showdown': (data: {
    winnerId: string;
    amount: number;
    cards: Record<string, Rank>;
    refunds: Record<string, number>;
  }) => void;
  'game:hand_complete': (data: { handNumber: number; winnerId: string; amount: number; byFold: boolean }) => void;

  // Lobby
  'lobby:tables': (data: { tables: TableInfo[] }) => void;
}

// ========== Shared Types ==========

// Per-viewer game state (the viewer's own card is null)
export interface ClientGameState extends PlayerView {
  tableId: string;
  variant: string;
  ante: number;
  isHandInProgress: boolean;
}

export interface TableInfo {
  id: string;
  name: string;
  variant: string;
  ante: number;
  startingStack: number;
  players: number;
  maxPlayers: number;
  phase: Phase;
  handNumber: number;
  isFinished: boolean;
}

export interface TableSummary extends TableInfo {
  pot: number;
  currentBet: number;
  currentTurnPlayerId: string | null;
  tableWinnerId: string | null;
  participants: Omit<ParticipantView, 'card'>[];
}
