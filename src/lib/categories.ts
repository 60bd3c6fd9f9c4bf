/*
 * Hand category registry.
 *
 * A category is just a name and a predicate closed over its parameters
 * (group size, straight length, ...); the simulator treats them all alike.
 */

import type { Card } from 'lib/cards.ts'
import * as P from 'lib/predicates.ts'

export type Predicate = (cards: readonly Card[], jokers: number) => boolean;

export interface Category {
  readonly name: string;
  evaluate: Predicate;
}

export function category(name: string, evaluate: Predicate): Category {
  return {name, evaluate};
}

/*
 * Hand sizes with their own set of extra categories.
 */
export enum HandSize {
  FIVE = 5,
  SIX = 6,
}

export function is_hand_size(n: number): n is HandSize {
  return n === HandSize.FIVE || n === HandSize.SIX;
}

const n_of_a_kind = (name: string, n: number) =>
  category(name, (cards, jokers) => P.is_n_of_a_kind(cards, n, jokers));

const flush_n = (name: string, n: number) =>
  category(name, (cards, jokers) => P.is_flush_n(cards, n, jokers));

const straight = (name: string, size: number) =>
  category(name, (cards, jokers) => P.is_straight(cards, jokers, size));

const flush = (name: string, size: number) =>
  category(name, (cards, jokers) => P.is_flush(cards, jokers, size));

const straight_flush = (name: string, size: number) =>
  category(name, (cards, jokers) => P.is_straight_flush(cards, jokers, size));

/*
 * Categories enabled for every hand size.
 */
function base_catalog(): Category[] {
  return [
    n_of_a_kind('Pair', 2),
    n_of_a_kind('3 of a kind', 3),
    n_of_a_kind('4 of a kind', 4),
    n_of_a_kind('5 of a kind', 5),
    category('2 pair', P.is_two_pair),
  ];
}

function extra_catalog(hand_size: HandSize): Category[] {
  switch (hand_size) {
    case HandSize.FIVE: return [
      category('Full house', P.is_full_house),
      category('Flush house', P.is_flush_house),
      straight_flush('Straight flush', 5),
      flush_n('Flush five', 5),
    ];
    case HandSize.SIX: return [
      category('3 pair', P.is_three_pair),
      n_of_a_kind('6 of a kind', 6),
      category('2 triplets', P.is_two_triplet),
      straight('Straight (6)', 6),
      flush('Flush (6)', 6),
      category('Full mansion', P.is_full_mansion),
      straight_flush('Straight flush (6)', 6),
      flush_n('Flush six', 6),
    ];
  }
}

/*
 * Every category tallied for hands of `hand_size`.
 */
export function catalog(hand_size: HandSize): Category[] {
  return [...base_catalog(), ...extra_catalog(hand_size)];
}
