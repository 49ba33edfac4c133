/**
 * Internal modules barrel export
 */

// Constants
export { MAX_URN_SIZE, MAX_WEIGHT } from './constants';

// Tree
export {
  leaf,
  node,
  treeWeight,
  treeSampleAt,
  treeUpdateAt,
  treeReplaceAt,
  treeIter,
  type TreeUpdate,
  type TreeReplace,
} from './tree';

// Almost-perfect construction
export { reverseBits, buildAlmostPerfect } from './almost-perfect';

// Urn
export {
  singleton,
  fromList,
  fromListNaive,
  size,
  weight,
  entries,
  sampleAt,
  updateAt,
  replaceAt,
  insert,
  uninsert,
  removeAt,
  sample,
  update,
  replace,
  remove,
  type UrnUpdate,
  type UrnReplace,
  type Uninserted,
  type Removed,
} from './urn';

// Randomness
export { mathRandom, seededRandom, drawIndex, type RandomSource } from './random';

// Inspection
export {
  leafCount,
  sumLeafWeights,
  weightsMatch,
  leafDepths,
  isAlmostPerfect,
  isWellFormed,
} from './inspect';

// Types
export type { Weight, Index, Leaf, Node, Tree, Urn, Weighted, Updater } from './types';
