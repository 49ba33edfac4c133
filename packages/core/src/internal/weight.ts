/**
 * Checked weight arithmetic
 *
 * Weights never wrap: anything that would leave the safe integer range throws.
 */

import { MAX_WEIGHT } from './constants';
import type { Index, Weight } from './types';

export function assertWeight(w: Weight): void {
  if (!Number.isSafeInteger(w) || w < 0) {
    throw new RangeError(`Invalid weight: ${w}`);
  }
}

export function addWeights(a: Weight, b: Weight): Weight {
  const sum = a + b;
  if (sum > MAX_WEIGHT) throw new RangeError('Weight overflow');
  return sum;
}

// (w - removed) + added, without passing through an unsafe intermediate
export function swapWeight(w: Weight, removed: Weight, added: Weight): Weight {
  if (removed > w) throw new RangeError(`Weight underflow: ${w} - ${removed}`);
  return addWeights(w - removed, added);
}

export function assertIndex(i: Index, total: Weight): void {
  if (!Number.isInteger(i) || i < 0 || i >= total) {
    throw new RangeError(`Index ${i} out of range [0, ${total})`);
  }
}
