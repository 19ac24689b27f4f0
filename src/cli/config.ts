import type { Branching } from "../core/types.js";
import type { FieldError } from "./problem.js";
import { asInt, asString, pushErr } from "./validation.js";

export interface CliConfig {
  wildcard: string;
  branching: Branching;
  /** Maximum number of keys printed per command; unlimited when absent. */
  limit?: number;
}

export type ConfigResult = { ok: true; config: CliConfig } | { ok: false; errors: FieldError[] };

export type Env = Record<string, string | undefined>;

export function loadConfig(env: Env): ConfigResult {
  const errors: FieldError[] = [];

  const wildcard = env.TRIESET_WILDCARD ?? ".";
  if (Array.from(wildcard).length !== 1) pushErr(errors, "TRIESET_WILDCARD", "must be exactly one character");

  const branching = asString(env.TRIESET_BRANCHING) ?? "map";
  if (branching !== "map" && branching !== "ranked") {
    pushErr(errors, "TRIESET_BRANCHING", "must be one of: map, ranked");
  }

  let limit: number | undefined;
  if (env.TRIESET_LIMIT !== undefined) {
    limit = asInt(env.TRIESET_LIMIT);
    if (limit === undefined || limit < 1) pushErr(errors, "TRIESET_LIMIT", "must be a positive integer");
  }

  if (errors.length) return { ok: false, errors };
  return { ok: true, config: { wildcard, branching: branching === "ranked" ? "ranked" : "map", limit } };
}
