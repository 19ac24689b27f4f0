import { SortedAlphabet } from "./sortedAlphabet.js";

/** Latin-1 Supplement code points that are arithmetic operators, not letters. */
const EXCLUDES_LATIN_1 = new Set([0x00d7, 0x00f7]);

/** Latin Extended-A: kra, n preceded by apostrophe, long s. */
const EXCLUDES_LATIN_A = new Set([0x0138, 0x0149, 0x017f]);

const UPPER = /^\p{Lu}$/u;
const LOWER = /^\p{Ll}$/u;

function range(start: number, end: number, keep: (cp: number) => boolean = () => true): readonly string[] {
  const out: string[] = [];
  for (let cp = start; cp <= end; cp++) {
    if (keep(cp)) out.push(String.fromCodePoint(cp));
  }
  return Object.freeze(out);
}

export const LATIN_BASIC_UPPER = range(0x0041, 0x005a);
export const LATIN_BASIC_LOWER = range(0x0061, 0x007a);

export const LATIN_1_UPPER = range(0x00c0, 0x00de, (cp) => !EXCLUDES_LATIN_1.has(cp));
export const LATIN_1_LOWER = range(0x00df, 0x00ff, (cp) => !EXCLUDES_LATIN_1.has(cp));

export const LATIN_A_UPPER = range(
  0x0100,
  0x017f,
  (cp) => !EXCLUDES_LATIN_A.has(cp) && UPPER.test(String.fromCodePoint(cp)),
);
export const LATIN_A_LOWER = range(
  0x0100,
  0x017f,
  (cp) => !EXCLUDES_LATIN_A.has(cp) && LOWER.test(String.fromCodePoint(cp)),
);

export const LATIN_ALL_UPPER: readonly string[] = Object.freeze([...LATIN_BASIC_UPPER, ...LATIN_1_UPPER, ...LATIN_A_UPPER]);
export const LATIN_ALL_LOWER: readonly string[] = Object.freeze([...LATIN_BASIC_LOWER, ...LATIN_1_LOWER, ...LATIN_A_LOWER]);

/** Both cases of all three blocks, ordered by code point. */
export const latinAlphabet = new SortedAlphabet([...LATIN_ALL_UPPER, ...LATIN_ALL_LOWER]);

export const LATIN_ALL = latinAlphabet.characters();
