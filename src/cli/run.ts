import { readFile } from "node:fs/promises";

import type { TrieSet } from "../core/trieSet.js";
import { isTrieSetError } from "../core/errors.js";
import { MemoryTrieSet } from "../core/impl/memoryTrieSet.js";
import { loadConfig, type Env } from "./config.js";
import { problem, problemFromError, type Problem } from "./problem.js";

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  readFile(path: string): Promise<string>;
}

export const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  readFile: (path) => readFile(path, "utf8"),
};

export const USAGE = "usage: latin-trieset <wordlist> <size|keys|prefix|longest|match|contains> [argument]";

const EXIT_OK = 0;
const EXIT_NO_MATCH = 1;
const EXIT_USAGE = 2;

type Command = "size" | "keys" | "prefix" | "longest" | "match" | "contains";

const ARITY: Record<Command, 0 | 1> = {
  size: 0,
  keys: 0,
  prefix: 1,
  longest: 1,
  match: 1,
  contains: 1,
};

function isCommand(v: string | undefined): v is Command {
  return v !== undefined && Object.prototype.hasOwnProperty.call(ARITY, v);
}

/**
 * Loads a word list into a set and answers one query about it.
 * Returns the process exit status.
 */
export async function run(argv: readonly string[], env: Env, io: CliIo = consoleIo): Promise<number> {
  const cfg = loadConfig(env);
  if (!cfg.ok) {
    return fail(io, problem({ status: EXIT_USAGE, code: "INVALID_ARGUMENT", detail: "invalid configuration", errors: cfg.errors }));
  }
  const { wildcard, branching, limit } = cfg.config;

  const [file, command, arg] = argv;
  if (!file || !isCommand(command) || (ARITY[command] === 1 && arg === undefined) || argv.length > 2 + ARITY[command]) {
    io.err(USAGE);
    return EXIT_USAGE;
  }

  let text: string;
  try {
    text = await io.readFile(file);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return fail(io, problem({ status: EXIT_USAGE, code: "INPUT_UNREADABLE", detail: `cannot read ${file}: ${reason}` }));
  }

  try {
    const set = new MemoryTrieSet({ wildcard, branching });
    loadWordlist(set, text, io);

    const print = (keys: Iterable<string>): number => {
      let n = 0;
      for (const k of keys) {
        if (limit !== undefined && n >= limit) break;
        io.out(k);
        n++;
      }
      return EXIT_OK;
    };

    const q = arg ?? "";
    switch (command) {
      case "size":
        io.out(String(set.size()));
        return EXIT_OK;
      case "keys":
        return print(set.keys());
      case "prefix":
        return print(set.keysWithPrefix(q));
      case "match":
        return print(set.keysThatMatch(q));
      case "longest": {
        const hit = set.longestPrefixOf(q);
        if (hit === undefined) return EXIT_NO_MATCH;
        io.out(hit);
        return EXIT_OK;
      }
      case "contains": {
        const found = set.contains(q);
        io.out(String(found));
        return found ? EXIT_OK : EXIT_NO_MATCH;
      }
    }
  } catch (e) {
    if (!isTrieSetError(e)) throw e;
    return fail(io, problemFromError(e, EXIT_USAGE));
  }
}

/** One key per line; blank lines and `#` comments are skipped, invalid lines reported and skipped. */
export function loadWordlist(set: TrieSet, text: string, io: CliIo): number {
  let loaded = 0;
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]!.trim();
    if (!line || line.startsWith("#")) continue;
    try {
      if (set.add(line)) loaded++;
    } catch (e) {
      if (!isTrieSetError(e)) throw e;
      io.err(`line ${i + 1}: ${e.message}`);
    }
  }
  return loaded;
}

function fail(io: CliIo, body: Problem): number {
  io.err(JSON.stringify(body));
  return body.status;
}
