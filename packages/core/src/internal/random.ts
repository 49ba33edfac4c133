/**
 * Randomness port
 * Urn operations only ever ask for one uniform integer per call.
 */

import seedrandom from 'seedrandom';
import type { Index, Urn } from './types';

export interface RandomSource {
  /** Uniform integer in [low, highInclusive] */
  drawUniform(low: number, highInclusive: number): number;
}

function fromUnitFloat(next: () => number): RandomSource {
  return {
    drawUniform(low, highInclusive) {
      return low + Math.floor(next() * (highInclusive - low + 1));
    },
  };
}

export const mathRandom: RandomSource = fromUnitFloat(Math.random);

// Reproducible source for tests and simulations
export function seededRandom(seed: string): RandomSource {
  const rng = seedrandom(seed);
  return fromUnitFloat(() => rng());
}

/**
 * Draws the index for a randomized urn operation.
 * Valid indices are [0, weight), so the source is asked for [0, weight - 1].
 */
export function drawIndex<T>(urn: Urn<T>, random: RandomSource): Index {
  const total = urn.tree.weight;
  if (total === 0) {
    throw new RangeError('Cannot draw from an urn of total weight 0');
  }
  return random.drawUniform(0, total - 1);
}
