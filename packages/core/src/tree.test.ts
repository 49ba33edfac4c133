/**
 * Tests for weighted tree operations (sample, update, replace)
 */

import { describe, it, expect } from 'vitest';
import {
  leaf,
  node,
  treeWeight,
  treeSampleAt,
  treeUpdateAt,
  treeReplaceAt,
  treeIter,
  weightsMatch,
  type Node,
  type Tree,
} from './internal';

function asNode<T>(tree: Tree<T>): Node<T> {
  if (tree.kind !== 'node') throw new Error('expected a node');
  return tree;
}

//            21
//        9         12
//     5    4     7    5
//    a4 b1 c2 d2 e2 f5 g3 h2
function exampleTree(): Tree<string> {
  return node(
    node(node(leaf(4, 'a'), leaf(1, 'b')), node(leaf(2, 'c'), leaf(2, 'd'))),
    node(node(leaf(2, 'e'), leaf(5, 'f')), node(leaf(3, 'g'), leaf(2, 'h')))
  );
}

describe('weighted tree', () => {
  describe('construction', () => {
    it('should sum child weights in node()', () => {
      const tree = exampleTree();
      expect(treeWeight(tree)).toBe(21);
      expect(asNode(tree).left.weight).toBe(9);
      expect(asNode(tree).right.weight).toBe(12);
      expect(weightsMatch(tree)).toBe(true);
    });

    it('should iterate leaves left to right', () => {
      const values = [...treeIter(exampleTree())].map(([, v]) => v);
      expect(values.join('')).toBe('abcdefgh');
    });
  });

  describe('treeSampleAt', () => {
    it('should find the leaf owning index 12', () => {
      expect(treeSampleAt(exampleTree(), 12)).toBe('f');
    });

    it('should respect bucket boundaries', () => {
      const tree = exampleTree();
      expect(treeSampleAt(tree, 0)).toBe('a');
      expect(treeSampleAt(tree, 3)).toBe('a');
      expect(treeSampleAt(tree, 4)).toBe('b');
      expect(treeSampleAt(tree, 5)).toBe('c');
      expect(treeSampleAt(tree, 20)).toBe('h');
    });

    it('should skip zero-weight leaves', () => {
      const tree = node(leaf(0, 'x'), leaf(3, 'y'));
      expect(treeSampleAt(tree, 0)).toBe('y');
    });

    it('should reject indices outside [0, weight)', () => {
      const tree = exampleTree();
      expect(() => treeSampleAt(tree, 21)).toThrow(RangeError);
      expect(() => treeSampleAt(tree, -1)).toThrow(RangeError);
      expect(() => treeSampleAt(tree, 1.5)).toThrow('Index 1.5 out of range [0, 21)');
    });
  });

  describe('treeUpdateAt', () => {
    it('should update the sampled leaf and its ancestors', () => {
      const tree = exampleTree();
      const res = treeUpdateAt(tree, 12, (w, v) => [w + 1, v.toUpperCase()]);

      expect(res.old).toEqual([5, 'f']);
      expect(res.updated).toEqual([6, 'F']);
      expect(treeWeight(res.tree)).toBe(22);
      expect(asNode(res.tree).right.weight).toBe(13);
      expect(weightsMatch(res.tree)).toBe(true);
      expect(treeSampleAt(res.tree, 12)).toBe('F');
    });

    it('should leave the original tree untouched', () => {
      const tree = exampleTree();
      treeUpdateAt(tree, 12, () => [100, 'z']);

      expect(treeWeight(tree)).toBe(21);
      expect(treeSampleAt(tree, 12)).toBe('f');
    });

    it('should share subtrees off the update path', () => {
      const tree = exampleTree();
      const res = treeUpdateAt(tree, 12, (w, v) => [w, v]);

      expect(asNode(res.tree).left).toBe(asNode(tree).left);
      expect(asNode(asNode(res.tree).right).right).toBe(asNode(asNode(tree).right).right);
      expect(asNode(res.tree).right).not.toBe(asNode(tree).right);
    });

    it('should reject an invalid weight from the updater', () => {
      expect(() => treeUpdateAt(exampleTree(), 0, () => [-1, 'a'])).toThrow('Invalid weight: -1');
    });
  });

  describe('treeReplaceAt', () => {
    it('should return the replaced pair', () => {
      const res = treeReplaceAt(exampleTree(), 10, 'z', 0);

      expect(res.old).toEqual([4, 'a']);
      expect(treeWeight(res.tree)).toBe(27);
      expect(treeSampleAt(res.tree, 9)).toBe('z');
      expect(treeSampleAt(res.tree, 10)).toBe('b');
      expect(weightsMatch(res.tree)).toBe(true);
    });

    it('should allow replacing with weight 0', () => {
      const res = treeReplaceAt(exampleTree(), 0, 'z', 20);

      expect(res.old).toEqual([2, 'h']);
      expect(treeWeight(res.tree)).toBe(19);
      expect(treeSampleAt(res.tree, 18)).toBe('g');
    });

    it('should reject overflowing weights', () => {
      const tree = node(leaf(Number.MAX_SAFE_INTEGER - 1, 'a'), leaf(1, 'b'));
      expect(() => treeReplaceAt(tree, 2, 'c', Number.MAX_SAFE_INTEGER - 1)).toThrow('Weight overflow');
    });
  });
});
