import type { Branching, Char, Key } from "../types.js";
import type { Alphabet } from "../alphabet.js";
import type { BranchesFactory, TrieNode } from "../branches.js";
import type { TrieSet, TrieSetOptions } from "../trieSet.js";
import { InvalidArgumentError, InvalidCharacterError, requireKey } from "../errors.js";
import { latinAlphabet } from "./latinAlphabet.js";
import { mapBranches } from "./mapBranches.js";
import { rankedBranches } from "./rankedBranches.js";

export const DEFAULT_WILDCARD = ".";

type Frame = { node: TrieNode; path: string };

function branchesFor(branching: unknown, alphabet: Alphabet): BranchesFactory {
  switch (branching) {
    case "map":
      return mapBranches(alphabet);
    case "ranked":
      return rankedBranches(alphabet);
    default:
      throw new InvalidArgumentError("branching", "must be one of: map, ranked");
  }
}

function lazily<T>(iterate: () => Iterator<T>): Iterable<T> {
  return { [Symbol.iterator]: iterate };
}

export class MemoryTrieSet implements TrieSet {
  readonly alphabet: Alphabet;
  readonly wildcard: Char;
  readonly branching: Branching;

  private readonly newBranches: BranchesFactory;
  private root: TrieNode;
  private count = 0;
  private nodes = 1;

  constructor(opts: TrieSetOptions = {}) {
    this.alphabet = opts.alphabet ?? latinAlphabet;

    const wildcard = opts.wildcard ?? DEFAULT_WILDCARD;
    if (typeof wildcard !== "string" || Array.from(wildcard).length !== 1) {
      throw new InvalidArgumentError("wildcard", "must be exactly one character");
    }
    if (this.alphabet.has(wildcard)) {
      throw new InvalidArgumentError("wildcard", "must not be a member of the alphabet");
    }
    this.wildcard = wildcard;

    this.branching = opts.branching ?? "map";
    this.newBranches = branchesFor(this.branching, this.alphabet);
    this.root = this.makeNode();
  }

  add(key: Key): boolean {
    return this.insert(this.validated(requireKey(key)));
  }

  addAll(keys: Iterable<Key>): number {
    const batch: Key[] = [];
    for (const key of keys) {
      batch.push(this.validated(requireKey(key, `keys[${batch.length}]`)));
    }

    let added = 0;
    for (const k of batch) {
      if (this.insert(k)) added++;
    }
    return added;
  }

  contains(key: Key): boolean {
    return this.descend(requireKey(key))?.terminal ?? false;
  }

  delete(key: Key): boolean {
    const k = requireKey(key);

    // parent and edge label of every node below the root on the key's path
    const path: Array<[TrieNode, Char]> = [];
    let cur = this.root;
    for (const ch of k) {
      const next = cur.children.get(ch);
      if (!next) return false;
      path.push([cur, ch]);
      cur = next;
    }
    if (!cur.terminal) return false;

    cur.terminal = false;
    this.count--;

    let node = cur;
    for (let i = path.length - 1; i >= 0; i--) {
      if (node.terminal || node.children.size > 0) break;
      const [parent, ch] = path[i]!;
      parent.children.delete(ch);
      this.nodes--;
      node = parent;
    }
    return true;
  }

  clear(): void {
    this.root = this.makeNode();
    this.count = 0;
    this.nodes = 1;
  }

  size(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  nodeCount(): number {
    return this.nodes;
  }

  keys(): Iterable<Key> {
    return lazily(() => this.walk(this.root, ""));
  }

  [Symbol.iterator](): Iterator<Key> {
    return this.walk(this.root, "");
  }

  keysWithPrefix(prefix: string): Iterable<Key> {
    const p = requireKey(prefix, "prefix");
    return lazily(() => this.walkFrom(p));
  }

  longestPrefixOf(query: string): Key | undefined {
    const q = requireKey(query, "query");

    let cur = this.root;
    let consumed = 0;
    let best = cur.terminal ? 0 : -1;
    for (const ch of q) {
      const next = cur.children.get(ch);
      if (!next) break;
      cur = next;
      consumed += ch.length;
      if (cur.terminal) best = consumed;
    }
    return best < 0 ? undefined : q.slice(0, best);
  }

  keysThatMatch(pattern: string): Iterable<Key> {
    const chars = Array.from(requireKey(pattern, "pattern"));
    chars.forEach((ch, position) => {
      if (ch !== this.wildcard && !this.alphabet.has(ch)) {
        throw new InvalidCharacterError({ character: ch, codePoint: ch.codePointAt(0) ?? 0, position });
      }
    });
    return lazily(() => this.match(chars));
  }

  private makeNode(): TrieNode {
    return { terminal: false, children: this.newBranches() };
  }

  private validated(key: Key): Key {
    const fault = this.alphabet.firstInvalid(key);
    if (fault) throw new InvalidCharacterError(fault);
    return key;
  }

  private insert(key: Key): boolean {
    let cur = this.root;
    for (const ch of key) {
      let next = cur.children.get(ch);
      if (!next) {
        next = this.makeNode();
        cur.children.set(ch, next);
        this.nodes++;
      }
      cur = next;
    }

    if (cur.terminal) return false;
    cur.terminal = true;
    this.count++;
    return true;
  }

  private descend(text: string): TrieNode | undefined {
    let cur: TrieNode | undefined = this.root;
    for (const ch of text) {
      cur = cur.children.get(ch);
      if (!cur) return undefined;
    }
    return cur;
  }

  private *walkFrom(prefix: string): Generator<Key> {
    const start = this.descend(prefix);
    if (start) yield* this.walk(start, prefix);
  }

  private *walk(start: TrieNode, prefix: string): Generator<Key> {
    const stack: Frame[] = [{ node: start, path: prefix }];

    while (stack.length) {
      const { node, path } = stack.pop()!;
      if (node.terminal) yield path;

      // push in reverse so pop() yields ascending order
      const edges = Array.from(node.children.entries());
      for (let i = edges.length - 1; i >= 0; i--) {
        const [ch, child] = edges[i]!;
        stack.push({ node: child, path: path + ch });
      }
    }
  }

  private *match(chars: readonly Char[]): Generator<Key> {
    const stack: Array<Frame & { depth: number }> = [{ node: this.root, path: "", depth: 0 }];

    while (stack.length) {
      const { node, path, depth } = stack.pop()!;
      const c = chars[depth];
      if (c === undefined) {
        if (node.terminal) yield path;
        continue;
      }

      if (c === this.wildcard) {
        const edges = Array.from(node.children.entries());
        for (let i = edges.length - 1; i >= 0; i--) {
          const [ch, child] = edges[i]!;
          stack.push({ node: child, path: path + ch, depth: depth + 1 });
        }
      } else {
        const child = node.children.get(c);
        if (child) stack.push({ node: child, path: path + c, depth: depth + 1 });
      }
    }
  }
}
