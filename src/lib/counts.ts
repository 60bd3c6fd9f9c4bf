/*
 * Per-hand aggregates over real cards.
 *
 * None of these see jokers; the predicates account for those separately.
 *
 * Each aggregate writes into `out` when one is passed, zeroing it first, so
 * the sampling loop can reuse one buffer per aggregate instead of allocating
 * on every hand.  Passing a `suit` restricts the aggregate to that suit.
 */

import type { Card, Suit } from 'lib/cards.ts'
import { array_fill } from 'utils/array.ts'

import * as options from 'options.ts'

/*
 * rank -> number of cards of that rank
 */
export type RankCounts = number[];

/*
 * suit -> number of cards of that suit
 */
export type SuitCounts = number[];

/*
 * 0/1 presence of each rank, shifted up by one slot, with slot 0 mirroring
 * the ace in the top slot.  Length is num_ranks + 1.
 *
 *   slot:  0  1  2  3 ... 12 13
 *   rank:  A  2  3  4 ...  K  A
 */
export type StraightBitmap = number[];

export function rank_counts(
  cards: readonly Card[],
  suit: Suit | null = null,
  out: RankCounts = array_fill(options.num_ranks, 0),
): RankCounts {
  out.fill(0);
  for (const c of cards) {
    if (suit === null || c.suit === suit) ++out[c.rank];
  }
  return out;
}

export function suit_counts(
  cards: readonly Card[],
  out: SuitCounts = array_fill(options.num_suits, 0),
): SuitCounts {
  out.fill(0);
  for (const c of cards) ++out[c.suit];
  return out;
}

export function ranks_for_straight(
  cards: readonly Card[],
  suit: Suit | null = null,
  out: StraightBitmap = array_fill(options.num_ranks + 1, 0),
): StraightBitmap {
  out.fill(0);
  for (const c of cards) {
    if (suit === null || c.suit === suit) out[c.rank + 1] = 1;
  }
  out[0] = out[options.num_ranks];
  return out;
}
