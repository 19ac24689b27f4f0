import type { Char } from "../types.js";
import type { Alphabet } from "../alphabet.js";
import type { Branches, BranchesFactory, TrieNode } from "../branches.js";

/** Hash-keyed edges; only the characters actually present take space. */
export class MapBranches implements Branches {
  private readonly edges = new Map<Char, TrieNode>();

  constructor(private readonly alphabet: Alphabet) {}

  get size(): number {
    return this.edges.size;
  }

  get(ch: Char): TrieNode | undefined {
    return this.edges.get(ch);
  }

  set(ch: Char, node: TrieNode): void {
    this.edges.set(ch, node);
  }

  delete(ch: Char): boolean {
    return this.edges.delete(ch);
  }

  *entries(): Iterable<[Char, TrieNode]> {
    const labels = Array.from(this.edges.keys()).sort((a, b) => this.alphabet.compare(a, b));
    for (const ch of labels) {
      const node = this.edges.get(ch);
      if (node) yield [ch, node];
    }
  }
}

export function mapBranches(alphabet: Alphabet): BranchesFactory {
  return () => new MapBranches(alphabet);
}
