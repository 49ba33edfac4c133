/**
 * Structural checks for trees and urns, used by the test suite
 */

import type { Tree, Urn, Weight } from './types';

export function leafCount<T>(tree: Tree<T>): number {
  return tree.kind === 'leaf' ? 1 : leafCount(tree.left) + leafCount(tree.right);
}

// Recomputed bottom-up, ignoring the cached node weights
export function sumLeafWeights<T>(tree: Tree<T>): Weight {
  return tree.kind === 'leaf' ? tree.weight : sumLeafWeights(tree.left) + sumLeafWeights(tree.right);
}

export function weightsMatch<T>(tree: Tree<T>): boolean {
  if (tree.kind === 'leaf') return true;
  return (
    tree.weight === sumLeafWeights(tree.left) + sumLeafWeights(tree.right) &&
    weightsMatch(tree.left) &&
    weightsMatch(tree.right)
  );
}

export function leafDepths<T>(tree: Tree<T>, depth = 0): number[] {
  if (tree.kind === 'leaf') return [depth];
  return [...leafDepths(tree.left, depth + 1), ...leafDepths(tree.right, depth + 1)];
}

export function isAlmostPerfect<T>(tree: Tree<T>): boolean {
  const depths = leafDepths(tree);
  return Math.max(...depths) - Math.min(...depths) <= 1;
}

export function isWellFormed<T>(urn: Urn<T>): boolean {
  return leafCount(urn.tree) === urn.size && weightsMatch(urn.tree);
}
