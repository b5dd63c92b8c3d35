import type { Server } from 'socket.io';
import { TableManager, type TableDefaults } from '../table/TableManager.js';
import { setupAuthMiddleware, type AuthenticatedSocket } from './authMiddleware.js';
import {
  handleDisconnect,
  handleGameAction,
  handleGetTables,
  handleTableJoin,
  handleTableLeave,
} from './handlers.js';

interface GameSocketDependencies {
  tableManager: TableManager;
}

export function setupGameSocket(io: Server, defaults: TableDefaults, tableCount: number = 1): GameSocketDependencies {
  const tableManager = new TableManager(io, defaults);

  // Create default tables
  for (let i = 0; i < tableCount; i++) {
    tableManager.createTable();
  }

  setupAuthMiddleware(io);

  io.on('connection', (socket: AuthenticatedSocket) => {
    const { playerId, playerName } = socket;
    if (!playerId || !playerName) {
      socket.disconnect(true);
      return;
    }
    const identity = { playerId, name: playerName };

    console.log(`Player connected: ${playerId} (${playerName})`);
    socket.emit('connection:established', { playerId });

    socket.on('table:join', (data: unknown) => {
      void handleTableJoin(socket, identity, data, tableManager);
    });

    socket.on('table:leave', () => {
      void handleTableLeave(socket, identity, tableManager);
    });

    socket.on('game:action', (data: unknown) => {
      void handleGameAction(socket, identity, data, tableManager);
    });

    socket.on('lobby:get_tables', () => {
      handleGetTables(socket, tableManager);
    });

    socket.on('disconnect', () => {
      void handleDisconnect(identity, tableManager);
    });
  });

  return { tableManager };
}
