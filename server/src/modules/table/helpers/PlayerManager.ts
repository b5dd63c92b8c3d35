// Connected players at a table. Seat order and chips live in the game state;
// this only maps a player to the connection their messages go to.

import type { ClientConnection, SeatInfo } from '../types.js';

export class PlayerManager {
  private players: Map<string, SeatInfo> = new Map();

  add(seat: SeatInfo): void {
    this.players.set(seat.playerId, seat);
  }

  /**
   * Drops the player's connection; returns what was stored, if anything.
   */
  remove(playerId: string): SeatInfo | null {
    const seat = this.players.get(playerId);
    if (!seat) return null;
    this.players.delete(playerId);
    return seat;
  }

  get(playerId: string): SeatInfo | undefined {
    return this.players.get(playerId);
  }

  getConnection(playerId: string): ClientConnection | undefined {
    return this.players.get(playerId)?.connection;
  }

  forEachPlayer(callback: (seat: SeatInfo) => void): void {
    for (const seat of this.players.values()) {
      callback(seat);
    }
  }
}
