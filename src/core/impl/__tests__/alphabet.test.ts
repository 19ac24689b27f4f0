import { describe, expect, it } from "vitest";
import {
  LATIN_1_LOWER,
  LATIN_1_UPPER,
  LATIN_A_LOWER,
  LATIN_A_UPPER,
  LATIN_ALL,
  LATIN_ALL_LOWER,
  LATIN_ALL_UPPER,
  LATIN_BASIC_LOWER,
  LATIN_BASIC_UPPER,
  SortedAlphabet,
  latinAlphabet,
} from "../../../index.js";

const utf8Bytes = (chars: readonly string[]) => Buffer.byteLength(chars.join(""), "utf8");

function isAscending(chars: readonly string[]): boolean {
  for (let i = 1; i < chars.length; i++) {
    if (chars[i - 1]!.charCodeAt(0) >= chars[i]!.charCodeAt(0)) return false;
  }
  return true;
}

describe("Latin alphabet tables", () => {
  it("holds the Basic Latin letters as single UTF-8 bytes", () => {
    expect(LATIN_BASIC_UPPER).toHaveLength(26);
    expect(LATIN_BASIC_LOWER).toHaveLength(26);
    expect(LATIN_BASIC_UPPER[0]).toBe("A");
    expect(LATIN_BASIC_LOWER[25]).toBe("z");
    expect(utf8Bytes(LATIN_BASIC_UPPER)).toBe(26);
    expect(utf8Bytes(LATIN_BASIC_LOWER)).toBe(26);
  });

  it("drops the multiplication and division signs from Latin-1", () => {
    expect(LATIN_1_UPPER).toHaveLength(30);
    expect(LATIN_1_LOWER).toHaveLength(32);
    expect(LATIN_1_UPPER).not.toContain("×");
    expect(LATIN_1_LOWER).not.toContain("÷");
    expect(LATIN_1_UPPER[0]).toBe("À");
    expect(LATIN_1_UPPER[29]).toBe("Þ");
    expect(LATIN_1_LOWER[0]).toBe("ß");
    expect(LATIN_1_LOWER[31]).toBe("ÿ");
    expect(utf8Bytes(LATIN_1_UPPER)).toBe(60);
    expect(utf8Bytes(LATIN_1_LOWER)).toBe(64);
  });

  it("splits Latin Extended-A by case and drops kra, apostrophe n and long s", () => {
    expect(LATIN_A_UPPER).toHaveLength(63);
    expect(LATIN_A_LOWER).toHaveLength(62);
    expect(LATIN_A_UPPER).toContain("Ÿ");
    expect(LATIN_A_UPPER).toContain("İ");
    expect(LATIN_A_LOWER).toContain("ı");
    for (const excluded of ["ĸ", "ŉ", "ſ"]) {
      expect(LATIN_A_UPPER).not.toContain(excluded);
      expect(LATIN_A_LOWER).not.toContain(excluded);
    }
    expect(utf8Bytes(LATIN_A_UPPER)).toBe(126);
    expect(utf8Bytes(LATIN_A_LOWER)).toBe(124);
  });

  it("keeps each combined table to one case", () => {
    expect(LATIN_ALL_UPPER).toHaveLength(119);
    expect(LATIN_ALL_LOWER).toHaveLength(120);
    expect(LATIN_ALL_UPPER.filter((ch) => !/^\p{Lu}$/u.test(ch))).toEqual([]);
    expect(LATIN_ALL_LOWER.filter((ch) => !/^\p{Ll}$/u.test(ch))).toEqual([]);
  });

  it("orders every table by code point", () => {
    for (const table of [LATIN_BASIC_UPPER, LATIN_1_LOWER, LATIN_A_UPPER, LATIN_A_LOWER, LATIN_ALL_UPPER, LATIN_ALL_LOWER, LATIN_ALL]) {
      expect(isAscending(table)).toBe(true);
    }
    expect(LATIN_ALL).toHaveLength(239);
    expect(latinAlphabet.size).toBe(239);
  });
});

describe("latinAlphabet", () => {
  it("ranks characters densely in code point order", () => {
    expect(latinAlphabet.rank("A")).toBe(0);
    expect(latinAlphabet.rank("Z")).toBe(25);
    expect(latinAlphabet.rank("a")).toBe(26);
    expect(latinAlphabet.rank("À")).toBe(52);
    expect(latinAlphabet.rank("ž")).toBe(238);
    expect(latinAlphabet.charAt(26)).toBe("a");
    expect(latinAlphabet.charAt(239)).toBeUndefined();
  });

  it("rejects unsupported and multi-character input", () => {
    expect(latinAlphabet.has("÷")).toBe(false);
    expect(latinAlphabet.has("1")).toBe(false);
    expect(latinAlphabet.rank("AB")).toBe(-1);
    expect(latinAlphabet.rank("")).toBe(-1);
    expect(latinAlphabet.has("é")).toBe(true);
  });

  it("is case sensitive in its order", () => {
    expect(latinAlphabet.compare("a", "B")).toBeGreaterThan(0);
    expect(latinAlphabet.compare("ä", "z")).toBeGreaterThan(0);
    expect(latinAlphabet.compare("q", "q")).toBe(0);
  });

  it("reports the first unsupported character by code point offset", () => {
    expect(latinAlphabet.firstInvalid("Grüße")).toBeUndefined();
    expect(latinAlphabet.firstInvalid("")).toBeUndefined();
    expect(latinAlphabet.firstInvalid("a÷b")).toEqual({ character: "÷", codePoint: 0xf7, position: 1 });
    expect(latinAlphabet.firstInvalid("\u{1f600}x1")).toEqual({ character: "\u{1f600}", codePoint: 0x1f600, position: 0 });
    expect(latinAlphabet.firstInvalid("x\u{1f600}1")?.position).toBe(1);
  });
});

describe("SortedAlphabet", () => {
  it("deduplicates and sorts its table", () => {
    const abc = new SortedAlphabet(["c", "a", "b", "a"]);
    expect(abc.size).toBe(3);
    expect(abc.characters()).toEqual(["a", "b", "c"]);
    expect(abc.rank("c")).toBe(2);
  });

  it("handles characters outside the basic plane", () => {
    const alpha = new SortedAlphabet(["z", "\u{1f600}"]);
    expect(alpha.rank("\u{1f600}")).toBe(1);
    expect(alpha.has("\ud83d")).toBe(false);
  });
});
