import { assertChipAmount, type ChipLedger } from './ChipLedger.js';

/** Process-local balances; every unknown player starts at `initialBalance`. */
export class InMemoryChipLedger implements ChipLedger {
  private balances: Map<string, number> = new Map();

  constructor(private readonly initialBalance: number) {}

  async debitChips(playerId: string, amount: number): Promise<boolean> {
    assertChipAmount(amount);
    const balance = this.balanceOf(playerId);
    if (balance < amount) return false;
    this.balances.set(playerId, balance - amount);
    return true;
  }

  async creditChips(playerId: string, amount: number): Promise<void> {
    assertChipAmount(amount);
    this.balances.set(playerId, this.balanceOf(playerId) + amount);
  }

  async queryBalance(playerId: string): Promise<number> {
    return this.balanceOf(playerId);
  }

  private balanceOf(playerId: string): number {
    return this.balances.get(playerId) ?? this.initialBalance;
  }
}
