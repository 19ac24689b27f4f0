export { SortedAlphabet } from "./sortedAlphabet.js";
export {
  LATIN_1_LOWER,
  LATIN_1_UPPER,
  LATIN_A_LOWER,
  LATIN_A_UPPER,
  LATIN_ALL,
  LATIN_ALL_LOWER,
  LATIN_ALL_UPPER,
  LATIN_BASIC_LOWER,
  LATIN_BASIC_UPPER,
  latinAlphabet,
} from "./latinAlphabet.js";
export { MapBranches, mapBranches } from "./mapBranches.js";
export { RankedBranches, rankedBranches } from "./rankedBranches.js";
export { DEFAULT_WILDCARD, MemoryTrieSet } from "./memoryTrieSet.js";
