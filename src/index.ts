export type { Branching, Char, CharFault, Key } from "./core/types.js";
export type { Alphabet } from "./core/alphabet.js";
export type { Branches, BranchesFactory, TrieNode } from "./core/branches.js";
export type { TrieSet, TrieSetOptions } from "./core/trieSet.js";
export {
  InvalidArgumentError,
  InvalidCharacterError,
  TrieSetError,
  isTrieSetError,
  type TrieSetErrorCode,
} from "./core/errors.js";
export * from "./core/impl/index.js";
