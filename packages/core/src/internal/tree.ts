/**
 * Weighted binary tree
 * Each node caches the total leaf weight below it, so an index in
 * [0, weight) can be resolved by a single descent.
 */

import type { Index, Leaf, Node, Tree, Updater, Weight, Weighted } from './types';
import { addWeights, assertIndex, assertWeight, swapWeight } from './weight';

export function leaf<T>(weight: Weight, value: T): Leaf<T> {
  return { kind: 'leaf', weight, value };
}

// Smart constructor: weight is the sum of both subtrees
export function node<T>(left: Tree<T>, right: Tree<T>): Node<T> {
  return { kind: 'node', weight: addWeights(left.weight, right.weight), left, right };
}

export function treeWeight<T>(tree: Tree<T>): Weight {
  return tree.weight;
}

export function treeSampleAt<T>(tree: Tree<T>, i: Index): T {
  assertIndex(i, tree.weight);
  let t = tree;
  let idx = i;
  while (t.kind === 'node') {
    const wl = t.left.weight;
    if (idx < wl) {
      t = t.left;
    } else {
      idx -= wl;
      t = t.right;
    }
  }
  return t.value;
}

export interface TreeUpdate<T> {
  old: Weighted<T>;
  updated: Weighted<T>;
  tree: Tree<T>;
}

/**
 * Rewrites the leaf owning index `i` with `f(weight, value)`.
 * Only the nodes on the path are rebuilt; siblings are shared with the input tree.
 */
export function treeUpdateAt<T>(tree: Tree<T>, i: Index, f: Updater<T>): TreeUpdate<T> {
  assertIndex(i, tree.weight);
  return updateGo(tree, i, f);
}

function updateGo<T>(tree: Tree<T>, i: Index, f: Updater<T>): TreeUpdate<T> {
  if (tree.kind === 'leaf') {
    const updated = f(tree.weight, tree.value);
    assertWeight(updated[0]);
    return {
      old: [tree.weight, tree.value],
      updated,
      tree: leaf(updated[0], updated[1]),
    };
  }

  const wl = tree.left.weight;
  const goLeft = i < wl;
  const res = goLeft ? updateGo(tree.left, i, f) : updateGo(tree.right, i - wl, f);
  const weight = swapWeight(tree.weight, res.old[0], res.updated[0]);
  return {
    old: res.old,
    updated: res.updated,
    tree: goLeft
      ? { kind: 'node', weight, left: res.tree, right: tree.right }
      : { kind: 'node', weight, left: tree.left, right: res.tree },
  };
}

export interface TreeReplace<T> {
  old: Weighted<T>;
  tree: Tree<T>;
}

export function treeReplaceAt<T>(tree: Tree<T>, weight: Weight, value: T, i: Index): TreeReplace<T> {
  assertWeight(weight);
  const { old, tree: next } = treeUpdateAt(tree, i, () => [weight, value]);
  return { old, tree: next };
}

// Leaves left to right
export function* treeIter<T>(tree: Tree<T>): IterableIterator<Weighted<T>> {
  const stack: Tree<T>[] = [tree];
  while (stack.length > 0) {
    const t = stack.pop();
    if (t === undefined) break;
    if (t.kind === 'leaf') {
      yield [t.weight, t.value];
    } else {
      stack.push(t.right, t.left);
    }
  }
}
