/*
 * Data structures and basic utilities for cards.
 *
 * Ranks and suits are dense indices so that every per-hand aggregate is a
 * flat count vector.  Jokers live in a pseudo-suit of their own and are never
 * seen by the hand predicates; a hand hands them over as a bare count.
 */

import assert from 'utils/assert.ts'
import * as options from 'options.ts'

/*
 * Card suit enum.
 */
export enum Suit {
  CLUBS = 0,
  DIAMONDS,
  SPADES,
  HEARTS,
  TRUMP,  // jokers only
}

export function suit_to_symbol(suit: Suit): string {
  switch (suit) {
    case Suit.CLUBS: return '♣';
    case Suit.DIAMONDS: return '♦';
    case Suit.SPADES: return '♠';
    case Suit.HEARTS: return '♥';
    case Suit.TRUMP: return '★';
  }
}

/*
 * Card rank enum.
 *
 * Zero-based: the deuce is 0 and the ace, always high, is 12.  The ace-low
 * straight is handled by the straight bitmap, not by the rank order.
 */
export enum Rank {
  R2 = 0,
  R3,
  R4,
  R5,
  R6,
  R7,
  R8,
  R9,
  R10,
  J,
  Q,
  K,
  A,
  JOKER,
}

export function rank_to_string(rank: Rank): string {
  if (rank <= Rank.R10) return '' + (rank + 2);
  switch (rank) {
    case Rank.J: return 'J';
    case Rank.Q: return 'Q';
    case Rank.K: return 'K';
    case Rank.A: return 'A';
    default: return '';
  }
}

/*
 * A single deck item: either a real (suit, rank) card or a joker.
 */
export class Card {
  constructor(
    readonly suit: Suit,
    readonly rank: Rank,
  ) {
    assert(
      Card.validate(suit, rank),
      'Card: validation',
      suit, rank
    );
  }

  static readonly SUITS: readonly Suit[] = [
    Suit.CLUBS,
    Suit.DIAMONDS,
    Suit.SPADES,
    Suit.HEARTS,
  ];

  static validate(suit: Suit, rank: Rank): boolean {
    if (suit === Suit.TRUMP) return rank === Rank.JOKER;
    return (true
      && Number.isInteger(suit) && suit >= 0 && suit < options.num_suits
      && Number.isInteger(rank) && rank >= 0 && rank < options.num_ranks
    );
  }

  static joker(): Card {
    return new Card(Suit.TRUMP, Rank.JOKER);
  }

  static same(l: Card, r: Card): boolean {
    return l.suit === r.suit && l.rank === r.rank;
  }

  get is_joker(): boolean {
    return this.suit === Suit.TRUMP;
  }

  toString(): string {
    return rank_to_string(this.rank) + suit_to_symbol(this.suit);
  }
}

/*
 * A drawn hand: the real cards, plus however many jokers came with them.
 */
export type Hand = {
  cards: Card[];
  jokers: number;
};

/*
 * Generate one standard 52-card deck, no jokers.
 */
export function* gen_deck(): Generator<Card, void> {
  for (const suit of Card.SUITS) {
    for (let rank = 0; rank < options.num_ranks; ++rank) {
      yield new Card(suit, rank);
    }
  }
}

/*
 * Split a drawn sequence of deck items into a Hand.
 */
export function to_hand(items: Iterable<Card>): Hand {
  const cards: Card[] = [];
  let jokers = 0;
  for (const item of items) {
    if (item.is_joker) {
      ++jokers;
    } else {
      cards.push(item);
    }
  }
  return {cards, jokers};
}

export function hand_to_string(hand: Hand): string {
  return [
    ...hand.cards.map(c => c.toString()),
    ...Array.from({length: hand.jokers}, () => Card.joker().toString()),
  ].join(' ');
}
