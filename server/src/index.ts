import Fastify from 'fastify';
import cors from '@fastify/cors';
import { Server } from 'socket.io';
import { env } from './config/env.js';
import { buildRules } from './config/rules.js';
import { createRedisClient } from './config/redis.js';
import type { ChipLedger } from './modules/ledger/ChipLedger.js';
import { InMemoryChipLedger } from './modules/ledger/InMemoryChipLedger.js';
import { RedisChipLedger } from './modules/ledger/RedisChipLedger.js';
import { setupGameSocket } from './modules/game/socket.js';
import { lobbyRoutes } from './modules/lobby/routes.js';

const fastify = Fastify({
  logger: env.NODE_ENV === 'development' ? { level: 'warn' } : false,
  trustProxy: env.NODE_ENV === 'production',
});

// Plugins
await fastify.register(cors, {
  origin: env.CLIENT_URL,
  credentials: true,
});

// Health check
fastify.get('/health', async () => {
  return { status: 'ok', timestamp: new Date().toISOString() };
});

const rules = buildRules(env.GAME_VARIANT, {
  ante: env.ANTE,
  startingStack: env.STARTING_STACK,
  maxPlayers: env.MAX_PLAYERS,
});

const redis = env.REDIS_URL ? createRedisClient(env.REDIS_URL) : null;
const ledger: ChipLedger = redis
  ? new RedisChipLedger(redis, env.INITIAL_BALANCE)
  : new InMemoryChipLedger(env.INITIAL_BALANCE);

// Start server and setup Socket.io
const start = async () => {
  try {
    const io = new Server(fastify.server, {
      cors: {
        origin: env.CLIENT_URL,
        credentials: true,
      },
      pingInterval: 10000,
      pingTimeout: 5000,
    });

    const { tableManager } = setupGameSocket(
      io,
      { rules, ledger, minPlayersToStart: env.MIN_PLAYERS_TO_START },
      env.DEFAULT_TABLES
    );

    await fastify.register(lobbyRoutes({ tableManager }));

    await fastify.listen({ port: env.PORT, host: '0.0.0.0' });

    console.log(`✅ Server running on http://localhost:${env.PORT} (${rules.variant}, ante ${rules.ante})`);
    console.log(`✅ WebSocket ready on ws://localhost:${env.PORT}`);
    console.log(`✅ Ledger: ${redis ? 'redis' : 'in-memory'}`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

// Graceful shutdown
const shutdown = async () => {
  console.log('Shutting down...');
  await fastify.close();
  if (redis) await redis.quit();
  process.exit(0);
};

process.on('SIGTERM', () => void shutdown());
process.on('SIGINT', () => void shutdown());

await start();
