// A card is just its rank. Suits play no part in Indian Poker.
export type Rank = number;

export type Rng = () => number;

export type Phase = 'waiting' | 'betting' | 'showdown' | 'finished';

export type Action = 'check' | 'bet' | 'call' | 'raise' | 'fold';

// 'allin' is never requested directly; it is recorded when a bet, raise or call empties the stack.
export type LastAction = 'none' | Action | 'allin';

export interface DeckSpec {
  ranks: Rank[];
  copies: number;  // copies of each rank in the multiset
}

/** A wildcard that beats exactly one rank and loses to every other. */
export interface JokerRule {
  rank: Rank;
  beats: Rank;
}

export interface FoldPenaltyRule {
  rank: Rank;           // folding while showing this rank costs a share of the stack
  fraction: number;     // 0.5 = half
  rounding: 'up' | 'down';
}

export interface GameRules {
  variant: string;
  deck: DeckSpec;
  joker: JokerRule | null;
  ante: number;
  startingStack: number;
  maxPlayers: number;
  foldPenalty: FoldPenaltyRule | null;
}

export interface Deck {
  cards: Rank[];
  cursor: number;  // index of the next card to deal
}

export interface Participant {
  id: string;
  name: string;
  chips: number;          // chips behind (not in the pot)
  card: Rank | null;      // null outside a hand, and for anyone not dealt in
  currentBet: number;     // chips committed to the pot this round, ante included
  folded: boolean;
  allIn: boolean;
  lastAction: LastAction;
  sittingOut: boolean;    // joined mid-hand, dealt in from the next hand
  leaving: boolean;       // asked to leave mid-hand, removed once the hand settles
}

export interface GameAction {
  playerId: string;
  action: LastAction;
  amount: number;    // chips moved into the pot by this action
  penalty?: number;  // fold penalty, on top of amount
}

export interface HandResult {
  handNumber: number;
  winnerId: string;
  amount: number;                       // chips paid to the winner
  refunds: Record<string, number>;      // uncontested excess returned to its payers
  byFold: boolean;
  cards: Record<string, Rank>;          // cards at showdown, before any redraw
  redraws: Record<string, Rank>[];      // one entry per tie-break redraw round
}

export interface GameState {
  rules: GameRules;
  participants: Participant[];
  deck: Deck;
  pot: number;
  currentBet: number;     // highest currentBet among non-folded participants
  currentTurn: number;    // seat index, -1 when no action is awaited
  phase: Phase;
  totalChips: number;     // chip supply of the table
  handNumber: number;
  lastWinnerId: string | null;
  handResult: HandResult | null;
  tableWinnerId: string | null;
  actionLog: GameAction[];
}

export interface ValidAction {
  action: Action;
  minAmount: number;
  maxAmount: number;
}
