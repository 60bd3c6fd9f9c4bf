/*
 * Hand category predicates.
 *
 * Every predicate takes the real cards of a hand and a count of jokers, and
 * answers whether the jokers can be assigned ranks and suits such that the
 * whole hand falls into the category.  Nothing here enumerates assignments;
 * each check works directly off the count vectors in lib/counts.ts.  Those
 * are written into module-level scratch buffers, so no predicate allocates.
 *
 * Jokers are not consumed across predicates, nor across the suits of a
 * suit-partitioned check: each test sees the full joker count.
 *
 * All predicates are pure and insensitive to the order of `cards`.
 */

import type { Card } from 'lib/cards.ts'
import { rank_counts, suit_counts, ranks_for_straight } from 'lib/counts.ts'
import type { RankCounts, StraightBitmap } from 'lib/counts.ts'
import { array_fill } from 'utils/array.ts'

import * as options from 'options.ts'

const scratch = {
  ranks: array_fill(options.num_ranks, 0),
  suits: array_fill(options.num_suits, 0),
  bits: array_fill(options.num_ranks + 1, 0),
};

///////////////////////////////////////////////////////////////////////////////
/*
 * Checks over count vectors.
 */

function has_group(counts: RankCounts, n: number, jokers: number): boolean {
  for (const count of counts) {
    if (count + jokers >= n) return true;
  }
  return false;
}

/*
 * The `n` group is built on the tallest rank, since that costs the fewest
 * jokers.  Its overflow past `n` stays available to the `m` group, so a rank
 * with n + m cards satisfies both on its own.  Otherwise the `m` group goes
 * on the second-tallest rank with whatever jokers remain.
 */
function has_two_groups(
  counts: RankCounts,
  n: number,
  m: number,
  jokers: number,
): boolean {
  let first = 0;
  let second = 0;
  for (const count of counts) {
    if (count > first) {
      second = first;
      first = count;
    } else if (count > second) {
      second = count;
    }
  }

  const topup = Math.max(n - first, 0);
  if (topup > jokers) return false;
  jokers -= topup;

  const overflow = first + topup - n;
  return overflow + jokers >= m || second + jokers >= m;
}

/*
 * Only slot 0 aliases the ace, so K-A-2-... never matches.
 */
function has_run(bits: StraightBitmap, size: number, jokers: number): boolean {
  if (size > bits.length) return false;

  let window = 0;
  for (let i = 0; i < size; ++i) window += bits[i];
  if (window + jokers >= size) return true;

  for (let i = size; i < bits.length; ++i) {
    window += bits[i] - bits[i - size];
    if (window + jokers >= size) return true;
  }
  return false;
}

///////////////////////////////////////////////////////////////////////////////
/*
 * Rank groups.
 */

/*
 * Whether some rank reaches `n` copies, jokers included.
 */
export function is_n_of_a_kind(
  cards: readonly Card[],
  n: number,
  jokers: number,
): boolean {
  if (jokers >= n) return true;
  return has_group(rank_counts(cards, null, scratch.ranks), n, jokers);
}

/*
 * Whether the hand holds `n` disjoint pairs.  A rank with four cards is two
 * pairs.
 *
 * A joker matched with an unpaired card buys a pair for one joker; two
 * jokers together buy a pair for two.  So we complete odd ranks first and
 * pair off whatever jokers are left.
 */
export function is_n_pairs(
  cards: readonly Card[],
  n: number,
  jokers: number,
): boolean {
  let pairs = 0;
  for (let count of rank_counts(cards, null, scratch.ranks)) {
    if (count % 2 === 1 && jokers > 0) {
      --jokers;
      ++count;
    }
    pairs += Math.floor(count / 2);
  }
  pairs += Math.floor(jokers / 2);
  return pairs >= n;
}

export function is_two_pair(cards: readonly Card[], jokers: number): boolean {
  return is_n_pairs(cards, 2, jokers);
}

export function is_three_pair(cards: readonly Card[], jokers: number): boolean {
  return is_n_pairs(cards, 3, jokers);
}

/*
 * Whether one group of `n` and another group of `m` can be formed, n >= m.
 */
export function is_n_and_m_of_a_kind(
  cards: readonly Card[],
  n: number,
  m: number,
  jokers: number,
): boolean {
  return has_two_groups(rank_counts(cards, null, scratch.ranks), n, m, jokers);
}

export function is_full_house(cards: readonly Card[], jokers: number): boolean {
  return is_n_and_m_of_a_kind(cards, 3, 2, jokers);
}

export function is_full_mansion(
  cards: readonly Card[],
  jokers: number,
): boolean {
  return is_n_and_m_of_a_kind(cards, 4, 2, jokers);
}

export function is_two_triplet(
  cards: readonly Card[],
  jokers: number,
): boolean {
  return is_n_and_m_of_a_kind(cards, 3, 3, jokers);
}

///////////////////////////////////////////////////////////////////////////////
/*
 * Suits and sequences.
 *
 * Suit-partitioned checks run once per suit over that suit's cards, each
 * with the full joker count.
 */

export function is_flush(
  cards: readonly Card[],
  jokers: number,
  size: number,
): boolean {
  for (const count of suit_counts(cards, scratch.suits)) {
    if (count + jokers >= size) return true;
  }
  return false;
}

/*
 * Whether `size` consecutive ranks can be filled, the ace playing either
 * end.
 */
export function is_straight(
  cards: readonly Card[],
  jokers: number,
  size: number,
): boolean {
  return has_run(ranks_for_straight(cards, null, scratch.bits), size, jokers);
}

export function is_straight_flush(
  cards: readonly Card[],
  jokers: number,
  size: number,
): boolean {
  for (let suit = 0; suit < options.num_suits; ++suit) {
    const bits = ranks_for_straight(cards, suit, scratch.bits);
    if (has_run(bits, size, jokers)) return true;
  }
  return false;
}

export function is_flush_house(
  cards: readonly Card[],
  jokers: number,
): boolean {
  for (let suit = 0; suit < options.num_suits; ++suit) {
    const counts = rank_counts(cards, suit, scratch.ranks);
    if (has_two_groups(counts, 3, 2, jokers)) return true;
  }
  return false;
}

/*
 * n of a kind, all in one suit.
 */
export function is_flush_n(
  cards: readonly Card[],
  n: number,
  jokers: number,
): boolean {
  if (jokers >= n) return true;
  for (let suit = 0; suit < options.num_suits; ++suit) {
    const counts = rank_counts(cards, suit, scratch.ranks);
    if (has_group(counts, n, jokers)) return true;
  }
  return false;
}
