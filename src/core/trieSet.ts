import type { Branching, Char, Key } from "./types.js";
import type { Alphabet } from "./alphabet.js";

export interface TrieSetOptions {
  /** Legal edge labels. Defaults to the Latin letter alphabet. */
  alphabet?: Alphabet;
  /** Pattern symbol matching any one character in `keysThatMatch`. Defaults to ".". */
  wildcard?: Char;
  /** Node edge representation. Defaults to "map". */
  branching?: Branching;
}

/**
 * Set of strings over a restricted alphabet, stored as a trie.
 *
 * Contract notes:
 * - `add` and `addAll` reject keys with unsupported characters before touching any node
 * - queries never throw on unsupported characters; they just find nothing
 * - iterables are lazy and restartable; mutating the set while iterating is undefined
 * - not safe for concurrent mutation without external locking
 */
export interface TrieSet extends Iterable<Key> {
  readonly alphabet: Alphabet;
  readonly wildcard: Char;

  /** Returns true if the key was not already present. */
  add(key: Key): boolean;
  /** Adds every key, or none of them when any is invalid. Returns how many were new. */
  addAll(keys: Iterable<Key>): number;
  contains(key: Key): boolean;
  /** Returns true if the key was present. Absent keys are a no-op. */
  delete(key: Key): boolean;
  clear(): void;

  size(): number;
  isEmpty(): boolean;
  /** Nodes currently allocated, root included. */
  nodeCount(): number;

  /** Every key in ascending alphabet order. */
  keys(): Iterable<Key>;
  keysWithPrefix(prefix: string): Iterable<Key>;
  /** Longest member that is a prefix of `query`, or undefined. */
  longestPrefixOf(query: string): Key | undefined;
  /** Members of the pattern's length matching it position by position. */
  keysThatMatch(pattern: string): Iterable<Key>;
}
