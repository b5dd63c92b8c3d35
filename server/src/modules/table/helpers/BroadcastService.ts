// WebSocket wrapper

import type { ServerToClientEvents } from '../../../shared/types/websocket.js';
import type { ClientConnection, MessageLog, RoomEmitter } from '../types.js';
import { TABLE_CONSTANTS } from '../constants.js';

export type ServerEvent = keyof ServerToClientEvents;
export type ServerEventPayload<E extends ServerEvent> = Parameters<ServerToClientEvents[E]>[0];

export class BroadcastService {
  private messageLog: MessageLog[] = [];

  constructor(
    private io: RoomEmitter,
    private roomName: string
  ) {}

  // Broadcast to the whole room. Never use for anything holding a player's own card.
  emitToRoom<E extends ServerEvent>(event: E, data: ServerEventPayload<E>): void {
    this.io.to(this.roomName).emit(event, data);
    this.logMessage(event, 'all', data);
  }

  emitToSocket<E extends ServerEvent>(
    connection: ClientConnection,
    playerId: string,
    event: E,
    data: ServerEventPayload<E>
  ): void {
    connection.emit(event, data);
    this.logMessage(event, playerId, data);
  }

  private logMessage(event: string, target: 'all' | string, data: unknown): void {
    this.messageLog.push({
      timestamp: Date.now(),
      event,
      target,
      data,
    });
    if (this.messageLog.length > TABLE_CONSTANTS.MAX_MESSAGE_LOG) {
      this.messageLog.shift();
    }
  }

  getMessageLog(): MessageLog[] {
    return this.messageLog;
  }
}
