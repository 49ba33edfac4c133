/**
 * Almost-perfect tree construction
 * Builds a tree whose leaf depths differ by at most one, in a single
 * left-to-right pass over the input.
 */

import type { Tree, Weighted } from './types';
import { leaf, node } from './tree';
import { assertWeight } from './weight';

// Reverses the lowest `n` bits of `x`; higher bits are dropped
export function reverseBits(n: number, x: number): number {
  let r = 0;
  let v = x;
  for (let k = 0; k < n; k++) {
    r = ((r << 1) | (v & 1)) >>> 0;
    v >>>= 1;
  }
  return r;
}

/**
 * Builds an almost perfect tree from `elems`.
 *
 * With `d = floor(log2(size))` the tree has 2^d slots at depth d. Of those,
 * `size - 2^d` take two elements instead of one. Slot `p` is doubled when the
 * d-bit reversal of `p` is below that remainder, which is exactly the set of
 * slots `insert` would have split after growing an urn to the same size.
 */
export function buildAlmostPerfect<T>(
  elems: readonly Weighted<T>[],
  size: number = elems.length
): Tree<T> {
  if (size < 1) {
    throw new RangeError('Cannot build a tree from an empty list');
  }

  const perfectDepth = 31 - Math.clz32(size);
  const remainder = size - 2 ** perfectDepth;
  let offset = 0;
  let position = 0;

  const take = (): Tree<T> => {
    const elem = elems[offset];
    if (elem === undefined) {
      throw new RangeError(`Expected size ${size} but got input of length ${elems.length}`);
    }
    offset++;
    assertWeight(elem[0]);
    return leaf(elem[0], elem[1]);
  };

  const go = (depth: number): Tree<T> => {
    if (depth === 0) {
      const double = reverseBits(perfectDepth, position) < remainder;
      position++;
      if (double) {
        const l = take();
        return node(l, take());
      }
      return take();
    }
    const l = go(depth - 1);
    return node(l, go(depth - 1));
  };

  const tree = go(perfectDepth);
  if (offset !== elems.length) {
    throw new RangeError(`Expected size ${size} but got input of length ${elems.length}`);
  }
  return tree;
}
