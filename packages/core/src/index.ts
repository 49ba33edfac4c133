/**
 * weighted-urn – persistent weighted sampling
 *
 * - singleton / fromList   → build an urn (fromList is O(n))
 * - insert / uninsert      → grow or shrink along the balanced insertion path
 * - sample / update / replace / remove → one random draw, O(log n)
 * - *At variants           → same operations at an explicit index
 *
 * Every operation returns a new urn; the previous one stays valid and
 * shares all untouched subtrees with the result.
 */

export {
  // Construction
  singleton,
  fromList,
  fromListNaive,
  // Accessors
  size,
  weight,
  entries,
  // Index-based
  sampleAt,
  updateAt,
  replaceAt,
  insert,
  uninsert,
  removeAt,
  // Randomized
  sample,
  update,
  replace,
  remove,
  // Randomness
  mathRandom,
  seededRandom,
  // Trees
  treeWeight,
  treeSampleAt,
  treeUpdateAt,
  treeReplaceAt,
  treeIter,
  buildAlmostPerfect,
  reverseBits,
  // Limits
  MAX_URN_SIZE,
  MAX_WEIGHT,
  type RandomSource,
  type UrnUpdate,
  type UrnReplace,
  type Uninserted,
  type Removed,
  type TreeUpdate,
  type TreeReplace,
  type Weight,
  type Index,
  type Leaf,
  type Node,
  type Tree,
  type Urn,
  type Weighted,
  type Updater,
} from './internal';
