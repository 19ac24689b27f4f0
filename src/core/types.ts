/** Shared core types used by module contracts. */

export type Key = string;

/** A single character of an alphabet (one code point). */
export type Char = string;

/** An unsupported character found inside a key. */
export interface CharFault {
  character: Char;
  codePoint: number;
  /** 0-based code point offset within the key. */
  position: number;
}

/** How a node stores its outgoing edges. */
export type Branching = "map" | "ranked";
