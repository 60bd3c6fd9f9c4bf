/*
 * Array utilities.
 */

import { random_index } from 'utils/random.ts'
import type { Rng } from 'utils/random.ts'

/*
 * Fill an array with `n` copies of `val`.
 */
export function array_fill<T>(n: number, val: T): T[] {
  const a : T[] = [];
  a.length = n;
  a.fill(val);
  return a;
}

/*
 * Do a Fisher-Yates shuffle on `arr`, both modifying it and returning it.
 */
export function array_shuffle<T>(arr: T[], rng: Rng = Math.random): T[] {
  return array_shuffle_front(arr, arr.length, rng);
}

/*
 * Partial Fisher-Yates: move a uniform sample of `k` elements, in uniformly
 * random order, into arr[0, k).  The rest of `arr` keeps what's left over.
 */
export function array_shuffle_front<T>(arr: T[], k: number, rng: Rng): T[] {
  const n = arr.length;
  const end = Math.min(k, n - 1);
  for (let i = 0; i < end; ++i) {
    const j = i + random_index(rng, n - i);
    const tmp = arr[i];
    arr[i] = arr[j];
    arr[j] = tmp;
  }
  return arr;
}
