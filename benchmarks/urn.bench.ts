/**
 * Benchmark: urn vs. an immer-managed flat array of weights
 */

import { bench, describe } from 'vitest';
import { produce } from 'immer';
import { fromList, insert, remove, sample, seededRandom } from '../packages/core/src/index';

// ===== Setup =====
const SIZE = 10000;

type Entry = readonly [weight: number, value: number];

function createEntries(size: number): Entry[] {
  return Array.from({ length: size }, (_, i) => [(i % 13) + 1, i] as const);
}

// Linear scan over cumulative weights
function flatSample(arr: readonly Entry[], i: number): number {
  let acc = 0;
  for (const [w, v] of arr) {
    acc += w;
    if (i < acc) return v;
  }
  throw new RangeError(`Index ${i} out of range`);
}

function flatWeight(arr: readonly Entry[]): number {
  return arr.reduce((sum, [w]) => sum + w, 0);
}

const entries = createEntries(SIZE);
const urn = fromList(entries);
if (urn === null) throw new Error('empty benchmark urn');

// ===== Construction =====
describe(`Build (${SIZE} items)`, () => {
  bench('Urn fromList()', () => {
    fromList(entries);
  });

  bench('Urn insert() fold', () => {
    let u = fromList(entries.slice(0, 1));
    for (let k = 1; k < entries.length && u !== null; k++) {
      u = insert(u, entries[k][0], entries[k][1]);
    }
  });
});

// ===== Sampling =====
describe(`Sample 100 times (${SIZE} items)`, () => {
  const random = seededRandom('bench-sample');
  const total = flatWeight(entries);

  bench('Flat array scan', () => {
    for (let k = 0; k < 100; k++) {
      flatSample(entries, random.drawUniform(0, total - 1));
    }
  });

  bench('Urn sample()', () => {
    for (let k = 0; k < 100; k++) {
      sample(urn, random);
    }
  });
});

// ===== Removal =====
describe(`Remove 100 sampled items (${SIZE} items)`, () => {
  const random = seededRandom('bench-remove');

  bench('Immer produce() splice', () => {
    let arr = entries;
    for (let k = 0; k < 100; k++) {
      const i = random.drawUniform(0, flatWeight(arr) - 1);
      const target = flatSample(arr, i);
      arr = produce(arr, draft => {
        draft.splice(draft.findIndex(([, v]) => v === target), 1);
      });
    }
  });

  bench('Urn remove()', () => {
    let u = urn;
    for (let k = 0; k < 100; k++) {
      const res = remove(u, random);
      if (res.urn === null) break;
      u = res.urn;
    }
  });
});
