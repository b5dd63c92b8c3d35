// Bankroll collaborator: chips move out of a player's balance when they sit
// down and back in when they leave, bust or win the table.

export interface ChipLedger {
  /** Resolves false, leaving the balance untouched, when it cannot cover `amount`. */
  debitChips(playerId: string, amount: number): Promise<boolean>;
  creditChips(playerId: string, amount: number): Promise<void>;
  queryBalance(playerId: string): Promise<number>;
}

export function assertChipAmount(amount: number): void {
  if (!Number.isInteger(amount) || amount < 0) {
    throw new RangeError(`Chip amount must be a non-negative integer, got ${amount}`);
  }
}
