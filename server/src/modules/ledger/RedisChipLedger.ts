import { REDIS_KEYS } from '../../config/redis.js';
import { assertChipAmount, type ChipLedger } from './ChipLedger.js';

/** The ioredis commands the ledger uses. */
export interface BalanceStore {
  setnx(key: string, value: number): Promise<number>;
  get(key: string): Promise<string | null>;
  incrby(key: string, increment: number): Promise<number>;
  decrby(key: string, decrement: number): Promise<number>;
}

/**
 * Balances kept in Redis. A debit is a DECRBY that is rolled back with INCRBY
 * when it would go negative, so concurrent debits never overdraw.
 */
export class RedisChipLedger implements ChipLedger {
  constructor(
    private readonly redis: BalanceStore,
    private readonly initialBalance: number
  ) {}

  async debitChips(playerId: string, amount: number): Promise<boolean> {
    assertChipAmount(amount);
    const key = await this.ensureAccount(playerId);
    const remaining = await this.redis.decrby(key, amount);
    if (remaining < 0) {
      await this.redis.incrby(key, amount);
      return false;
    }
    return true;
  }

  async creditChips(playerId: string, amount: number): Promise<void> {
    assertChipAmount(amount);
    const key = await this.ensureAccount(playerId);
    await this.redis.incrby(key, amount);
  }

  async queryBalance(playerId: string): Promise<number> {
    const key = await this.ensureAccount(playerId);
    const raw = await this.redis.get(key);
    return raw === null ? 0 : Number(raw);
  }

  private async ensureAccount(playerId: string): Promise<string> {
    const key = REDIS_KEYS.balance(playerId);
    await this.redis.setnx(key, this.initialBalance);
    return key;
  }
}
