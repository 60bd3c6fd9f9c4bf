/*
 * assertion wrapper
 */

import assert_ from 'assert'

export default function assert(
  cond: boolean,
  msg?: string,
  ...args: unknown[]
): asserts cond {
  if (msg && !cond) console.assert(cond, msg, ...args);
  assert_.strict(cond, msg);
}
