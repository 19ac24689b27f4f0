import type { Char } from "../types.js";
import type { Alphabet } from "../alphabet.js";
import type { Branches, BranchesFactory, TrieNode } from "../branches.js";

/**
 * Edges addressed by the character's dense alphabet rank.
 * The slot array only extends to the highest rank in use.
 */
export class RankedBranches implements Branches {
  private slots: Array<TrieNode | undefined> = [];
  private count = 0;

  constructor(private readonly alphabet: Alphabet) {}

  get size(): number {
    return this.count;
  }

  get(ch: Char): TrieNode | undefined {
    const r = this.alphabet.rank(ch);
    return r < 0 ? undefined : this.slots[r];
  }

  set(ch: Char, node: TrieNode): void {
    const r = this.alphabet.rank(ch);
    if (r < 0) throw new RangeError(`character outside alphabet: ${JSON.stringify(ch)}`);
    if (this.slots[r] === undefined) this.count++;
    while (this.slots.length <= r) this.slots.push(undefined);
    this.slots[r] = node;
  }

  delete(ch: Char): boolean {
    const r = this.alphabet.rank(ch);
    if (r < 0 || this.slots[r] === undefined) return false;
    this.slots[r] = undefined;
    this.count--;

    // keep the array no longer than the highest occupied slot
    let end = this.slots.length;
    while (end > 0 && this.slots[end - 1] === undefined) end--;
    this.slots.length = end;
    return true;
  }

  *entries(): Iterable<[Char, TrieNode]> {
    for (let r = 0; r < this.slots.length; r++) {
      const node = this.slots[r];
      if (!node) continue;
      const ch = this.alphabet.charAt(r);
      if (ch !== undefined) yield [ch, node];
    }
  }
}

export function rankedBranches(alphabet: Alphabet): BranchesFactory {
  return () => new RankedBranches(alphabet);
}
