// TableInstance types

import type { GameErrorCode } from '@indian-poker/shared';

/** The part of a socket.io Socket a table talks to. */
export interface ClientConnection {
  readonly id: string;
  emit(event: string, data: unknown): unknown;
  join(room: string): unknown;
  leave(room: string): unknown;
}

/** The part of a socket.io Server a table broadcasts through. */
export interface RoomEmitter {
  to(room: string): { emit(event: string, data: unknown): unknown };
}

export interface SeatInfo {
  playerId: string;
  name: string;
  connection: ClientConnection;
}

// Recent outgoing messages, kept for inspection
export interface MessageLog {
  timestamp: number;
  event: string;
  target: 'all' | string; // 'all' = broadcast, string = playerId
  data: unknown;
}

export type TableErrorCode = GameErrorCode | 'INSUFFICIENT_BALANCE' | 'TABLE_FINISHED';

export interface TableError {
  code: TableErrorCode;
  message: string;
}
