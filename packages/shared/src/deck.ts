import type { Deck, DeckSpec, Rank, Rng } from './types.js';
import { GameEngineError } from './engine/errors.js';

function buildCards(spec: DeckSpec): Rank[] {
  const cards: Rank[] = [];
  for (let copy = 0; copy < spec.copies; copy++) {
    for (const rank of spec.ranks) cards.push(rank);
  }
  return cards;
}

/** Unshuffled deck, cursor at the top. */
export function createDeck(spec: DeckSpec): Deck {
  return { cards: buildCards(spec), cursor: 0 };
}

/**
 * Rebuilds the full multiset and shuffles it (Fisher–Yates).
 * Cards already dealt are returned to the deck.
 */
export function shuffleDeck(spec: DeckSpec, rng: Rng = Math.random): Deck {
  const cards = buildCards(spec);
  for (let i = cards.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [cards[i], cards[j]] = [cards[j], cards[i]];
  }
  return { cards, cursor: 0 };
}

/**
 * Deals the card at the cursor. An exhausted deck is reshuffled in full first.
 */
export function dealCard(deck: Deck, spec: DeckSpec, rng: Rng = Math.random): { card: Rank; deck: Deck } {
  const source = deck.cursor >= deck.cards.length ? shuffleDeck(spec, rng) : deck;
  if (source.cards.length === 0) {
    throw new GameEngineError('EMPTY_DECK', 'Deck configuration has no cards');
  }
  return {
    card: source.cards[source.cursor],
    deck: { cards: source.cards, cursor: source.cursor + 1 },
  };
}

export function remainingCards(deck: Deck): number {
  return deck.cards.length - deck.cursor;
}
