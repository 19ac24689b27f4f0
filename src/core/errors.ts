import type { CharFault } from "./types.js";

export type TrieSetErrorCode = "INVALID_CHARACTER" | "INVALID_ARGUMENT";

export class TrieSetError extends Error {
  readonly code: TrieSetErrorCode;

  constructor(code: TrieSetErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A key holds a character outside the alphabet. Raised before any node is
 * touched, so the set is unchanged.
 */
export class InvalidCharacterError extends TrieSetError {
  readonly character: string;
  readonly codePoint: number;
  readonly position: number;

  constructor(fault: CharFault) {
    super("INVALID_CHARACTER", `unsupported character ${formatCodePoint(fault.codePoint)} at position ${fault.position}`);
    this.character = fault.character;
    this.codePoint = fault.codePoint;
    this.position = fault.position;
  }
}

export class InvalidArgumentError extends TrieSetError {
  readonly argument: string;

  constructor(argument: string, message: string) {
    super("INVALID_ARGUMENT", `${argument}: ${message}`);
    this.argument = argument;
  }
}

export function isTrieSetError(e: unknown): e is TrieSetError {
  return e instanceof TrieSetError;
}

/** Rejects anything that is not a string where a key is required. The empty string is a legal key. */
export function requireKey(value: unknown, argument: string = "key"): string {
  if (typeof value !== "string") {
    throw new InvalidArgumentError(argument, value == null ? "is required" : "must be a string");
  }
  return value;
}

export function formatCodePoint(cp: number): string {
  return `U+${cp.toString(16).toUpperCase().padStart(4, "0")}`;
}
