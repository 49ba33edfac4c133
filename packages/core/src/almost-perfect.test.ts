/**
 * Tests for linear-time almost-perfect tree construction
 */

import { describe, it, expect } from 'vitest';
import {
  reverseBits,
  buildAlmostPerfect,
  treeIter,
  leafCount,
  leafDepths,
  weightsMatch,
  isAlmostPerfect,
  type Weighted,
} from './internal';

function numbered(n: number): Weighted<number>[] {
  return Array.from({ length: n }, (_, i) => [(i % 7) + 1, i] as const);
}

describe('reverseBits', () => {
  it('should ignore bits above n', () => {
    expect(reverseBits(3, 0b1110)).toBe(0b011);
    expect(reverseBits(3, 0b110)).toBe(0b011);
  });

  it('should reverse all n bits', () => {
    expect(reverseBits(4, 0b1100)).toBe(0b0011);
  });

  it('should pad with trailing zeros when x is shorter than n', () => {
    expect(reverseBits(5, 0b011)).toBe(0b11000);
  });

  it('should handle trivial inputs', () => {
    expect(reverseBits(3, 0)).toBe(0);
    expect(reverseBits(1, 1)).toBe(1);
    expect(reverseBits(0, 5)).toBe(0);
  });

  it('should stay unsigned at 32 bits', () => {
    expect(reverseBits(32, 1)).toBe(0x80000000);
  });
});

describe('buildAlmostPerfect', () => {
  it('should build a single leaf', () => {
    const tree = buildAlmostPerfect([[5, 'x']]);
    expect(tree).toEqual({ kind: 'leaf', weight: 5, value: 'x' });
  });

  it('should double the first slot for three elements', () => {
    const tree = buildAlmostPerfect<string>([[2, 'R'], [4, 'G'], [3, 'B']]);
    expect(tree.weight).toBe(9);
    expect(leafDepths(tree)).toEqual([2, 2, 1]);
  });

  it('should spread doubled slots by bit reversal', () => {
    expect(leafDepths(buildAlmostPerfect(numbered(5)))).toEqual([3, 3, 2, 2, 2]);
    expect(leafDepths(buildAlmostPerfect(numbered(6)))).toEqual([3, 3, 2, 3, 3, 2]);
    expect(leafDepths(buildAlmostPerfect(numbered(8)))).toEqual([3, 3, 3, 3, 3, 3, 3, 3]);
  });

  it('should keep input order and invariants for sizes 1..64', () => {
    for (let n = 1; n <= 64; n++) {
      const elems = numbered(n);
      const tree = buildAlmostPerfect(elems);

      expect(leafCount(tree)).toBe(n);
      expect(weightsMatch(tree)).toBe(true);
      expect(isAlmostPerfect(tree)).toBe(true);
      expect([...treeIter(tree)]).toEqual(elems);
    }
  });

  it('should reject empty input', () => {
    expect(() => buildAlmostPerfect([])).toThrow(RangeError);
  });

  it('should fail when input runs out before the expected size', () => {
    expect(() => buildAlmostPerfect<string>([[1, 'a'], [1, 'b']], 3)).toThrow(
      'Expected size 3 but got input of length 2'
    );
  });

  it('should fail when input is longer than the expected size', () => {
    expect(() => buildAlmostPerfect<string>([[1, 'a'], [1, 'b'], [1, 'c']], 2)).toThrow(
      'Expected size 2 but got input of length 3'
    );
  });

  it('should reject invalid weights', () => {
    expect(() => buildAlmostPerfect<string>([[1, 'a'], [-1, 'b']])).toThrow('Invalid weight: -1');
  });
});
