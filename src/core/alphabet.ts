import type { Char, CharFault } from "./types.js";

/**
 * A finite, totally ordered set of characters legal as trie edge labels.
 *
 * Contract notes:
 * - `rank` is dense: supported characters map onto `0..size-1` in `compare` order
 * - implementations are immutable once constructed
 */
export interface Alphabet {
  readonly size: number;

  has(ch: Char): boolean;
  /** Dense rank of `ch`, or -1 when unsupported. */
  rank(ch: Char): number;
  charAt(rank: number): Char | undefined;
  compare(a: Char, b: Char): number;

  /** Every supported character in ascending order. */
  characters(): readonly Char[];

  /** First unsupported character of `key`, if any. */
  firstInvalid(key: string): CharFault | undefined;
}
