import { config } from 'dotenv';
import { z } from 'zod';

// Load .env file
config();

const envSchema = z.object({
  PORT: z.coerce.number().default(3001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  CLIENT_URL: z.string().default('http://localhost:5173'),
  // without it balances live in memory for the life of the process
  REDIS_URL: z.string().optional(),
  GAME_VARIANT: z.enum(['classic', 'joker']).default('classic'),
  ANTE: z.coerce.number().int().positive().optional(),
  STARTING_STACK: z.coerce.number().int().positive().optional(),
  MAX_PLAYERS: z.coerce.number().int().min(2).optional(),
  MIN_PLAYERS_TO_START: z.coerce.number().int().min(2).default(2),
  INITIAL_BALANCE: z.coerce.number().int().nonnegative().default(1000),
  DEFAULT_TABLES: z.coerce.number().int().nonnegative().default(1),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('Invalid environment variables:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const env = loadEnv();
