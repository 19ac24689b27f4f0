import { describe, expect, it } from "vitest";
import { loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("defaults to a dot wildcard, map branching and no limit", () => {
    expect(loadConfig({})).toEqual({ ok: true, config: { wildcard: ".", branching: "map", limit: undefined } });
  });

  it("reads every variable", () => {
    expect(loadConfig({ TRIESET_WILDCARD: "*", TRIESET_BRANCHING: "ranked", TRIESET_LIMIT: "10" })).toEqual({
      ok: true,
      config: { wildcard: "*", branching: "ranked", limit: 10 },
    });
  });

  it("collects one error per bad variable", () => {
    expect(loadConfig({ TRIESET_WILDCARD: "??", TRIESET_LIMIT: "1.5" })).toEqual({
      ok: false,
      errors: [
        { path: "TRIESET_WILDCARD", message: "must be exactly one character" },
        { path: "TRIESET_LIMIT", message: "must be a positive integer" },
      ],
    });
  });

  it("treats an empty branching variable as unset", () => {
    expect(loadConfig({ TRIESET_BRANCHING: "" })).toMatchObject({ ok: true, config: { branching: "map" } });
  });
});
