import type { GameRules, Rng } from '@indian-poker/shared';
import type { TableInfo } from '../../shared/types/websocket.js';
import type { ChipLedger } from '../ledger/ChipLedger.js';
import { TableInstance } from './TableInstance.js';
import type { RoomEmitter } from './types.js';

export interface TableDefaults {
  rules: GameRules;
  ledger: ChipLedger;
  minPlayersToStart: number;
  rng?: Rng;
}

export class TableManager {
  private tables: Map<string, TableInstance> = new Map();
  private playerTables: Map<string, string> = new Map(); // playerId -> tableId

  constructor(
    private readonly io: RoomEmitter,
    private readonly defaults: TableDefaults
  ) {}

  // Create a new table
  public createTable(): TableInstance {
    const table = new TableInstance(this.io, {
      ...this.defaults,
      onPlayerRemoved: (playerId, tableId) => this.removePlayerFromTracking(playerId, tableId),
    });
    this.tables.set(table.id, table);
    return table;
  }

  // Get a table by ID
  public getTable(tableId: string): TableInstance | undefined {
    return this.tables.get(tableId);
  }

  // Fill the fullest table that still has a seat, so hands start sooner
  public findAvailableTable(): TableInstance | null {
    let best: TableInstance | null = null;
    for (const table of this.tables.values()) {
      if (!table.hasAvailableSeat()) continue;
      if (!best || table.getPlayerCount() > best.getPlayerCount()) {
        best = table;
      }
    }
    return best;
  }

  public getOrCreateTable(): TableInstance {
    return this.findAvailableTable() ?? this.createTable();
  }

  public removeTable(tableId: string): void {
    if (!this.tables.has(tableId)) {
      console.warn(`[TableManager] removeTable: table ${tableId} not found`);
    }
    this.tables.delete(tableId);
  }

  // Get all tables info for lobby
  public getTablesInfo(): TableInfo[] {
    return Array.from(this.tables.values()).map(t => t.getTableInfo());
  }

  // Track player's current table
  public setPlayerTable(playerId: string, tableId: string): void {
    this.playerTables.set(playerId, tableId);
  }

  // Get player's current table
  public getPlayerTable(playerId: string): TableInstance | undefined {
    const tableId = this.playerTables.get(playerId);
    if (!tableId) return undefined;
    return this.tables.get(tableId);
  }

  /**
   * Stops tracking the player. With `tableId`, only if that is still their
   * table: a late removal from a table they already left must not clear a newer seat.
   */
  public removePlayerFromTracking(playerId: string, tableId?: string): void {
    if (tableId !== undefined && this.playerTables.get(playerId) !== tableId) return;
    this.playerTables.delete(playerId);
  }

  // Drop finished tables, keeping at least one table open for the lobby
  public cleanupFinishedTables(): void {
    for (const table of this.tables.values()) {
      if (table.isFinished) {
        this.removeTable(table.id);
      }
    }
    if (this.tables.size === 0) {
      this.createTable();
    }
  }
}
