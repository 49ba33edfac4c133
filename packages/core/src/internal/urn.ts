/**
 * Urn - a weighted tree plus its element count
 *
 * Insertion walks the path spelled by the current size, lowest bit first
 * (0 = left, 1 = right). Consecutive sizes alternate the side that grows,
 * so the tree stays almost perfect without any rebalancing.
 */

import { MAX_URN_SIZE } from './constants';
import { buildAlmostPerfect } from './almost-perfect';
import { drawIndex, mathRandom, type RandomSource } from './random';
import {
  leaf,
  node,
  treeIter,
  treeReplaceAt,
  treeSampleAt,
  treeUpdateAt,
} from './tree';
import type { Index, Tree, Updater, Urn, Weight, Weighted } from './types';
import { addWeights, assertIndex, assertWeight } from './weight';

// =====================================================
// Construction
// =====================================================

export function singleton<T>(weight: Weight, value: T): Urn<T> {
  assertWeight(weight);
  return { size: 1, tree: leaf(weight, value) };
}

// Folds `insert` over the list. O(n log n); kept as a reference for `fromList`.
export function fromListNaive<T>(elems: readonly Weighted<T>[]): Urn<T> | null {
  if (elems.length === 0) return null;
  const [w, a] = elems[0];
  let urn = singleton(w, a);
  for (let k = 1; k < elems.length; k++) {
    urn = insert(urn, elems[k][0], elems[k][1]);
  }
  return urn;
}

export function fromList<T>(elems: readonly Weighted<T>[]): Urn<T> | null {
  if (elems.length === 0) return null;
  if (elems.length > MAX_URN_SIZE) {
    throw new RangeError(`Urn size limit ${MAX_URN_SIZE} exceeded`);
  }
  return { size: elems.length, tree: buildAlmostPerfect(elems) };
}

// =====================================================
// Accessors
// =====================================================

export function size<T>(urn: Urn<T>): number {
  return urn.size;
}

export function weight<T>(urn: Urn<T>): Weight {
  return urn.tree.weight;
}

export function entries<T>(urn: Urn<T>): IterableIterator<Weighted<T>> {
  return treeIter(urn.tree);
}

// =====================================================
// Index-based operations
// =====================================================

export function sampleAt<T>(urn: Urn<T>, i: Index): T {
  return treeSampleAt(urn.tree, i);
}

export interface UrnUpdate<T> {
  old: Weighted<T>;
  updated: Weighted<T>;
  urn: Urn<T>;
}

export function updateAt<T>(urn: Urn<T>, i: Index, f: Updater<T>): UrnUpdate<T> {
  const res = treeUpdateAt(urn.tree, i, f);
  return { old: res.old, updated: res.updated, urn: { size: urn.size, tree: res.tree } };
}

export interface UrnReplace<T> {
  old: Weighted<T>;
  urn: Urn<T>;
}

export function replaceAt<T>(urn: Urn<T>, weight: Weight, value: T, i: Index): UrnReplace<T> {
  const res = treeReplaceAt(urn.tree, weight, value, i);
  return { old: res.old, urn: { size: urn.size, tree: res.tree } };
}

export function insert<T>(urn: Urn<T>, weight: Weight, value: T): Urn<T> {
  assertWeight(weight);
  if (urn.size >= MAX_URN_SIZE) {
    throw new RangeError(`Urn size limit ${MAX_URN_SIZE} exceeded`);
  }
  return { size: urn.size + 1, tree: insertGo(urn.tree, urn.size, weight, value) };
}

function insertGo<T>(tree: Tree<T>, path: number, w: Weight, a: T): Tree<T> {
  if (tree.kind === 'leaf') {
    return node(tree, leaf(w, a));
  }
  const weight = addWeights(tree.weight, w);
  const rest = path >>> 1;
  if (path & 1) {
    return { kind: 'node', weight, left: tree.left, right: insertGo(tree.right, rest, w, a) };
  }
  return { kind: 'node', weight, left: insertGo(tree.left, rest, w, a), right: tree.right };
}

export interface Uninserted<T> {
  removed: Weighted<T>;
  /** Total weight of the leaves left of the removed one */
  lowerBound: Weight;
  urn: Urn<T> | null;
}

interface UninsertStep<T> {
  removed: Weighted<T>;
  lowerBound: Weight;
  tree: Tree<T> | null;
}

/**
 * Removes the element the most recent `insert` added (for urns built by
 * `fromList`, the one that `insert` would have added last).
 */
export function uninsert<T>(urn: Urn<T>): Uninserted<T> {
  const res = uninsertGo(urn.tree, urn.size - 1);
  return {
    removed: res.removed,
    lowerBound: res.lowerBound,
    urn: res.tree === null ? null : { size: urn.size - 1, tree: res.tree },
  };
}

function uninsertGo<T>(tree: Tree<T>, path: number): UninsertStep<T> {
  if (tree.kind === 'leaf') {
    return { removed: [tree.weight, tree.value], lowerBound: 0, tree: null };
  }

  const rest = path >>> 1;
  if (path & 1) {
    const res = uninsertGo(tree.right, rest);
    return {
      removed: res.removed,
      lowerBound: res.lowerBound + tree.left.weight,
      tree: res.tree === null
        ? tree.left
        : { kind: 'node', weight: tree.weight - res.removed[0], left: tree.left, right: res.tree },
    };
  }

  const res = uninsertGo(tree.left, rest);
  return {
    removed: res.removed,
    lowerBound: res.lowerBound,
    tree: res.tree === null
      ? tree.right
      : { kind: 'node', weight: tree.weight - res.removed[0], left: res.tree, right: tree.right },
  };
}

export interface Removed<T> {
  removed: Weighted<T>;
  urn: Urn<T> | null;
}

/**
 * Removes the element owning index `i`.
 *
 * The last-inserted leaf is detached first; if it was not the target, it is
 * written over the target's slot, so the shape only changes along one path.
 */
export function removeAt<T>(urn: Urn<T>, i: Index): Removed<T> {
  assertIndex(i, urn.tree.weight);
  const { removed, lowerBound, urn: rest } = uninsert(urn);
  if (rest === null) {
    return { removed, urn: null };
  }

  const [w, a] = removed;
  if (i < lowerBound) {
    const res = replaceAt(rest, w, a, i);
    return { removed: res.old, urn: res.urn };
  }
  if (i < lowerBound + w) {
    return { removed, urn: rest };
  }
  const res = replaceAt(rest, w, a, i - w);
  return { removed: res.old, urn: res.urn };
}

// =====================================================
// Randomized operations (one draw each)
// =====================================================

export function sample<T>(urn: Urn<T>, random: RandomSource = mathRandom): T {
  return sampleAt(urn, drawIndex(urn, random));
}

export function update<T>(urn: Urn<T>, f: Updater<T>, random: RandomSource = mathRandom): UrnUpdate<T> {
  return updateAt(urn, drawIndex(urn, random), f);
}

export function replace<T>(
  urn: Urn<T>,
  weight: Weight,
  value: T,
  random: RandomSource = mathRandom
): UrnReplace<T> {
  return replaceAt(urn, weight, value, drawIndex(urn, random));
}

export function remove<T>(urn: Urn<T>, random: RandomSource = mathRandom): Removed<T> {
  return removeAt(urn, drawIndex(urn, random));
}
