import type { FastifyInstance } from 'fastify';
import type { TableManager } from '../table/TableManager.js';

interface LobbyDependencies {
  tableManager: TableManager;
}

export function lobbyRoutes(deps: LobbyDependencies) {
  const { tableManager } = deps;

  return async function (fastify: FastifyInstance) {
    fastify.get('/api/tables', async () => {
      return { tables: tableManager.getTablesInfo() };
    });

    // No cards here: the caller may be seated at the table
    fastify.get<{ Params: { id: string } }>('/api/tables/:id', async (request, reply) => {
      const table = tableManager.getTable(request.params.id);
      if (!table) {
        return reply.status(404).send({ error: 'Table not found' });
      }
      return table.getTableSummary();
    });
  };
}
