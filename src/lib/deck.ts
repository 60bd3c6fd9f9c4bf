/*
 * The sampling deck.
 */

import { Card, gen_deck, to_hand } from 'lib/cards.ts'
import type { Hand } from 'lib/cards.ts'
import { array_shuffle_front } from 'utils/array.ts'
import type { Rng } from 'utils/random.ts'

import assert from 'utils/assert.ts'

export class Deck {
  // deck contents; permuted in place by every draw
  #items: Card[];

  constructor(
    readonly ndecks: number,
    readonly njokers: number,
  ) {
    assert(Number.isInteger(ndecks) && ndecks >= 0, 'Deck: ndecks', ndecks);
    assert(Number.isInteger(njokers) && njokers >= 0, 'Deck: njokers', njokers);

    this.#items = [];
    for (let i = 0; i < ndecks; ++i) {
      this.#items.push(...gen_deck());
    }
    for (let i = 0; i < njokers; ++i) {
      this.#items.push(Card.joker());
    }
  }

  get size(): number { return this.#items.length; }

  /*
   * Every item in the deck, in no particular order.
   */
  get items(): readonly Card[] { return this.#items; }

  /*
   * Draw `n` items uniformly without replacement.
   *
   * Nothing is removed; the drawn items are shuffled to the front of the
   * deck and read off from there.  Since the deck only ever holds some
   * permutation of the same multiset, each draw is independent of the last.
   */
  draw(n: number, rng: Rng): Hand {
    assert(n <= this.size, 'Deck: draw exceeds deck size', n, this.size);
    array_shuffle_front(this.#items, n, rng);
    return to_hand(this.#items.slice(0, n));
  }
}
