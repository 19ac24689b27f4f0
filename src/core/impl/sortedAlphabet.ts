import type { Char, CharFault } from "../types.js";
import type { Alphabet } from "../alphabet.js";

/**
 * Alphabet backed by a sorted code point table.
 * Ranks come from a binary search, so the table may be sparse over a wide range.
 */
export class SortedAlphabet implements Alphabet {
  private readonly codePoints: Uint32Array;
  private readonly chars: readonly Char[];

  constructor(chars: Iterable<Char>) {
    const cps = new Set<number>();
    for (const ch of chars) {
      for (const c of ch) cps.add(codeOf(c));
    }
    const sorted = Array.from(cps).sort((a, b) => a - b);
    this.codePoints = Uint32Array.from(sorted);
    this.chars = Object.freeze(sorted.map((cp) => String.fromCodePoint(cp)));
  }

  get size(): number {
    return this.codePoints.length;
  }

  has(ch: Char): boolean {
    return this.rank(ch) >= 0;
  }

  rank(ch: Char): number {
    const cp = ch.codePointAt(0);
    if (cp === undefined || ch.length !== (cp > 0xffff ? 2 : 1)) return -1;
    return this.rankOf(cp);
  }

  charAt(rank: number): Char | undefined {
    return this.chars[rank];
  }

  compare(a: Char, b: Char): number {
    return codeOf(a) - codeOf(b);
  }

  characters(): readonly Char[] {
    return this.chars;
  }

  firstInvalid(key: string): CharFault | undefined {
    let position = 0;
    for (const ch of key) {
      const cp = codeOf(ch);
      if (this.rankOf(cp) < 0) return { character: ch, codePoint: cp, position };
      position++;
    }
    return undefined;
  }

  private rankOf(cp: number): number {
    let lo = 0;
    let hi = this.codePoints.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const v = this.codePoints[mid]!;
      if (v === cp) return mid;
      if (v < cp) lo = mid + 1;
      else hi = mid - 1;
    }
    return -1;
  }
}

/** Code point of a single character; -1 for the empty string. */
function codeOf(ch: Char): number {
  return ch.codePointAt(0) ?? -1;
}
