import { Redis } from 'ioredis';

export function createRedisClient(url: string): Redis {
  const redis = new Redis(url, {
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      const delay = Math.min(times * 50, 2000);
      return delay;
    },
  });

  redis.on('connect', () => {
    console.log('Connected to Redis');
  });

  redis.on('error', (err) => {
    console.error('Redis connection error:', err);
  });

  return redis;
}

// Redis key prefixes
export const REDIS_KEYS = {
  balance: (playerId: string) => `bankroll:balance:${playerId}`,
} as const;
