/*
 * Binomial interval estimates.
 */

import * as options from 'options.ts'

export type Estimate = {
  count: number;
  p: number;   // point estimate
  ci: number;  // interval half-width
};

/*
 * Wald interval for `count` successes in `trials`: p ± z·sqrt(p(1-p)/n).
 */
export function wald(
  count: number,
  trials: number,
  z: number = options.z_score,
): Estimate {
  if (trials === 0) return {count, p: 0, ci: 0};
  const p = count / trials;
  return {count, p, ci: z * Math.sqrt(p * (1 - p) / trials)};
}

/*
 * Whether two intervals intersect.  A zero count has no interval to speak of
 * and overlaps nothing.
 */
export function overlaps(l: Estimate, r: Estimate): boolean {
  if (l.count === 0 || r.count === 0) return false;
  return l.p - l.ci <= r.p + r.ci && r.p - r.ci <= l.p + l.ci;
}

/*
 * Number of overlapping pairs among `estimates`.
 */
export function count_overlaps(estimates: readonly Estimate[]): number {
  let n = 0;
  for (let i = 0; i < estimates.length; ++i) {
    for (let j = i + 1; j < estimates.length; ++j) {
      if (overlaps(estimates[i], estimates[j])) ++n;
    }
  }
  return n;
}
