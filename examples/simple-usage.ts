/**
 * Simple usage - building, sampling and shrinking an urn
 */

import {
  entries,
  fromList,
  insert,
  remove,
  replace,
  sample,
  seededRandom,
  singleton,
  size,
  uninsert,
  weight,
} from '../packages/core/src/index';

const random = seededRandom('simple-usage');

console.log('=== Weighted urn ===\n');

// ===== Build incrementally =====
console.log('1️⃣ Build with singleton() + insert()');
let urn = singleton(1, 'common');
urn = insert(urn, 3, 'rare');
urn = insert(urn, 6, 'legendary');
console.log('Entries:', [...entries(urn)]);
console.log('Size:', size(urn), 'Weight:', weight(urn));

// ===== Build in bulk =====
console.log('\n2️⃣ Build with fromList()');
const bulk = fromList([
  [2, 'R'],
  [4, 'G'],
  [3, 'B'],
]);
console.log('Entries:', bulk === null ? [] : [...entries(bulk)]);

// ===== Sampling =====
console.log('\n3️⃣ Sample 1000 times');
const counts = new Map<string, number>();
for (let k = 0; k < 1000; k++) {
  const v = sample(urn, random);
  counts.set(v, (counts.get(v) ?? 0) + 1);
}
console.log('Counts:', Object.fromEntries(counts));

// ===== Persistence =====
console.log('\n4️⃣ Replace returns a new urn');
const replaced = replace(urn, 10, 'mythic', random);
console.log('Replaced:', replaced.old);
console.log('Old urn:', [...entries(urn)]);
console.log('New urn:', [...entries(replaced.urn)]);

// ===== Shrinking =====
console.log('\n5️⃣ uninsert() and remove()');
const last = uninsert(urn);
console.log('Uninserted:', last.removed, 'lower bound:', last.lowerBound);
const drawn = remove(urn, random);
console.log('Removed:', drawn.removed, 'remaining:', drawn.urn === null ? 0 : size(drawn.urn));
