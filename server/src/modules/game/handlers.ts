import { z } from 'zod';
import type { TableManager } from '../table/TableManager.js';
import type { ClientConnection, TableError } from '../table/types.js';
import type { PlayerIdentity } from './authMiddleware.js';

const joinSchema = z.object({
  tableId: z.string().min(1).optional(),
}).default({});

const actionSchema = z.object({
  action: z.enum(['check', 'bet', 'call', 'raise', 'fold']),
  amount: z.number().int().nonnegative().optional(),
});

function emitError(socket: ClientConnection, error: { code?: string; message: string }): void {
  socket.emit('table:error', error);
}

function emitTableError(socket: ClientConnection, error: TableError): void {
  emitError(socket, { code: error.code, message: error.message });
}

export async function handleTableJoin(
  socket: ClientConnection,
  identity: PlayerIdentity,
  data: unknown,
  tableManager: TableManager
): Promise<void> {
  const parsed = joinSchema.safeParse(data);
  if (!parsed.success) {
    emitError(socket, { message: 'Invalid join request' });
    return;
  }

  if (tableManager.getPlayerTable(identity.playerId)) {
    emitError(socket, { code: 'ALREADY_SEATED', message: 'Already seated at a table' });
    return;
  }

  const { tableId } = parsed.data;
  const table = tableId ? tableManager.getTable(tableId) : tableManager.getOrCreateTable();
  if (!table) {
    emitError(socket, { message: 'Table not found' });
    return;
  }

  try {
    // tracked first so removals that happen while seating find the entry
    tableManager.setPlayerTable(identity.playerId, table.id);
    const error = await table.seatPlayer(identity.playerId, identity.name, socket);
    if (error) {
      tableManager.removePlayerFromTracking(identity.playerId, table.id);
      emitTableError(socket, error);
    }
  } catch (err) {
    tableManager.removePlayerFromTracking(identity.playerId, table.id);
    console.error(`[table:join] Failed to seat ${identity.playerId}:`, err);
    emitError(socket, { message: 'Failed to join table' });
  }
}

export async function handleTableLeave(
  socket: ClientConnection,
  identity: PlayerIdentity,
  tableManager: TableManager
): Promise<void> {
  const table = tableManager.getPlayerTable(identity.playerId);
  if (!table) {
    console.warn(`[table:leave] Player ${identity.playerId} tried to leave but not seated at any table`);
    return;
  }

  try {
    const error = await table.unseatPlayer(identity.playerId);
    if (error) emitTableError(socket, error);
  } catch (err) {
    console.error(`[table:leave] Failed for ${identity.playerId}:`, err);
    emitError(socket, { message: 'Failed to leave table' });
  } finally {
    tableManager.removePlayerFromTracking(identity.playerId, table.id);
    tableManager.cleanupFinishedTables();
  }
}

export async function handleGameAction(
  socket: ClientConnection,
  identity: PlayerIdentity,
  data: unknown,
  tableManager: TableManager
): Promise<void> {
  const table = tableManager.getPlayerTable(identity.playerId);
  if (!table) {
    emitError(socket, { code: 'NOT_SEATED', message: 'Not seated at a table' });
    return;
  }

  const parsed = actionSchema.safeParse(data);
  if (!parsed.success) {
    emitError(socket, { code: 'UNKNOWN_ACTION', message: 'Invalid action' });
    return;
  }

  try {
    const error = await table.handleAction(identity.playerId, parsed.data.action, parsed.data.amount ?? 0);
    if (error) emitTableError(socket, error);
  } catch (err) {
    console.error(`[game:action] Table ${table.id} failed:`, err);
    emitError(socket, { message: 'Internal table error' });
  } finally {
    tableManager.cleanupFinishedTables();
  }
}

export async function handleDisconnect(identity: PlayerIdentity, tableManager: TableManager): Promise<void> {
  console.log(`Player disconnected: ${identity.playerId}`);

  const table = tableManager.getPlayerTable(identity.playerId);
  if (!table) return;

  try {
    await table.unseatPlayer(identity.playerId);
  } catch (err) {
    console.error(`Error during disconnect cleanup for ${identity.playerId}:`, err);
  } finally {
    tableManager.removePlayerFromTracking(identity.playerId, table.id);
    tableManager.cleanupFinishedTables();
  }
}

export function handleGetTables(socket: ClientConnection, tableManager: TableManager): void {
  socket.emit('lobby:tables', { tables: tableManager.getTablesInfo() });
}
