import type { Char } from "./types.js";

export interface TrieNode {
  terminal: boolean;
  readonly children: Branches;
}

/**
 * Outgoing edges of one trie node.
 *
 * Contract notes:
 * - at most one child per character
 * - `entries` must yield edges in ascending alphabet order, so that
 *   depth-first walks produce keys in sorted order
 */
export interface Branches {
  readonly size: number;

  get(ch: Char): TrieNode | undefined;
  set(ch: Char, node: TrieNode): void;
  /** Returns false when there was no edge for `ch`. */
  delete(ch: Char): boolean;

  entries(): Iterable<[Char, TrieNode]>;
}

export type BranchesFactory = () => Branches;
