/*
 * Random sources.
 *
 * An Rng yields uniform doubles in [0, 1), like Math.random.
 */

export type Rng = () => number;

/*
 * The platform generator.  Not seedable.
 */
export function default_rng(): Rng {
  return Math.random;
}

/*
 * 32-bit mulberry stream; short period, only used to expand seeds.
 */
function mulberry32(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    let t = s = (s + 0x6D2B79F5) >>> 0;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  };
}

/*
 * xoshiro128** seeded from `seed`; period 2^128 - 1.
 */
export function seeded_rng(seed: number): Rng {
  const expand = mulberry32(seed);
  let a = expand();
  let b = expand();
  let c = expand();
  let d = expand();
  if ((a | b | c | d) === 0) a = 1;

  return () => {
    const result = Math.imul(rotl(Math.imul(b, 5), 7), 9) >>> 0;
    const t = b << 9;

    c ^= a;
    d ^= b;
    b ^= c;
    a ^= d;
    c ^= t;
    d = rotl(d, 11);

    return result / 4294967296;
  };
}

function rotl(x: number, k: number): number {
  return (x << k) | (x >>> (32 - k));
}

/*
 * Uniform integer in [0, n).
 */
export function random_index(rng: Rng, n: number): number {
  return Math.floor(rng() * n);
}
