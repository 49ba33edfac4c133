/**
 * Core type definitions
 */

// Non-negative safe integer, proportional to selection probability
export type Weight = number;

// Position in [0, totalWeight) addressing exactly one leaf
export type Index = number;

// Weighted tree leaf
export interface Leaf<T> {
  readonly kind: 'leaf';
  readonly weight: Weight;
  readonly value: T;
}

// Weighted tree node: weight is the sum of all leaf weights below it
export interface Node<T> {
  readonly kind: 'node';
  readonly weight: Weight;
  readonly left: Tree<T>;
  readonly right: Tree<T>;
}

export type Tree<T> = Leaf<T> | Node<T>;

// Urn: a tree together with its leaf count
export interface Urn<T> {
  readonly size: number;
  readonly tree: Tree<T>;
}

export type Weighted<T> = readonly [weight: Weight, value: T];

// Maps the sampled (weight, value) to its replacement
export type Updater<T> = (weight: Weight, value: T) => Weighted<T>;
