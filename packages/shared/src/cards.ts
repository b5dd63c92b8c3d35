import type { JokerRule, Rank } from './types.js';

/**
 * Orders two ranks. Positive when `a` wins, negative when `b` wins, 0 on a tie.
 * The joker exception is checked before falling back to numeric order.
 */
export function compareCards(a: Rank, b: Rank, joker: JokerRule | null): number {
  if (a === b) return 0;
  if (joker) {
    if (a === joker.rank) return b === joker.beats ? 1 : -1;
    if (b === joker.rank) return a === joker.beats ? -1 : 1;
  }
  return a - b;
}

/**
 * Ids whose card no other card beats. With a joker the order can cycle
 * (joker > top > low > joker); nobody is unbeaten then and every entry ties.
 */
export function findLeaders(entries: { id: string; card: Rank }[], joker: JokerRule | null): string[] {
  const leaders = entries.filter(entry =>
    !entries.some(other => other.id !== entry.id && compareCards(other.card, entry.card, joker) > 0)
  );
  return (leaders.length > 0 ? leaders : entries).map(e => e.id);
}
