/*
 * Monte Carlo harness.
 *
 * Draws hands in batches and tallies every category against each one, until
 * the confidence intervals of all nonzero categories have pulled apart.
 */

import { hand_to_string } from 'lib/cards.ts'
import type { Hand } from 'lib/cards.ts'
import type { Category } from 'lib/categories.ts'
import type { Deck } from 'lib/deck.ts'
import { wald, count_overlaps } from 'lib/stats.ts'
import type { Estimate } from 'lib/stats.ts'
import type { Rng } from 'utils/random.ts'

import assert from 'utils/assert.ts'
import log from 'utils/logger.ts'

export type SimulatorConfig = {
  cards: number;                 // items drawn per hand
  batch_size: number;            // hands between convergence checks
  max_iterations: number | null; // stop here even without convergence
  rng: Rng;
};

export class Tally {
  count: number = 0;

  constructor(readonly category: Category) {}

  get name(): string { return this.category.name; }
}

export type Row = Estimate & {name: string};

export type Summary = {
  iterations: number;
  converged: boolean;
  rows: Row[];  // sorted by (count desc, name desc)
};

export class Simulator {
  readonly tallies: Tally[];
  iterations: number = 0;
  last: Hand | null = null;  // most recent draw, for debug logs

  constructor(
    readonly deck: Deck,
    categories: readonly Category[],
    readonly config: SimulatorConfig,
  ) {
    assert(config.cards <= deck.size, 'Simulator: deck too small');
    assert(config.batch_size >= 1, 'Simulator: empty batch');
    this.tallies = categories.map(c => new Tally(c));
  }

  /*
   * Draw and score a single hand.
   */
  sample(): void {
    const hand = this.deck.draw(this.config.cards, this.config.rng);
    for (const tally of this.tallies) {
      if (tally.category.evaluate(hand.cards, hand.jokers)) ++tally.count;
    }
    this.last = hand;
    ++this.iterations;
  }

  batch(): void {
    for (let i = 0; i < this.config.batch_size; ++i) this.sample();
  }

  estimates(): Estimate[] {
    return this.tallies.map(t => wald(t.count, this.iterations));
  }

  /*
   * Number of category pairs whose intervals still intersect.
   */
  overlapping(): number {
    return count_overlaps(this.estimates());
  }

  /*
   * Run batches until convergence (or the iteration cap), reporting the
   * running iteration count after each batch.
   */
  run(on_batch?: (iterations: number) => void): Summary {
    while (true) {
      this.batch();
      on_batch?.(this.iterations);

      const overlapping = this.overlapping();
      log.debug('batch complete', {
        iterations: this.iterations,
        overlapping,
        sample: this.last === null ? null : hand_to_string(this.last),
      });

      if (overlapping === 0) return this.summary(true);

      const cap = this.config.max_iterations;
      if (cap !== null && this.iterations >= cap) return this.summary(false);
    }
  }

  summary(converged: boolean): Summary {
    const rows = this.tallies.map(t => ({
      name: t.name,
      ...wald(t.count, this.iterations),
    }));
    rows.sort((l, r) =>
      r.count - l.count ||
      (l.name < r.name ? 1 : l.name > r.name ? -1 : 0)
    );
    return {iterations: this.iterations, converged, rows};
  }
}
