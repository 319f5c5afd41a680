import deepEqual from "fast-deep-equal";

/**
 * Stringify a value for regex matching
 */
export function stringify(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === null) {
    return "null";
  }
  if (value === undefined) {
    return "undefined";
  }
  return JSON.stringify(value);
}

/**
 * Parse a pattern string into regex and flags
 * Supports /pattern/flags syntax for flags (e.g., /hello/i for case insensitive)
 * Throws a SyntaxError for an invalid pattern
 */
export function parsePattern(pattern: string): RegExp {
  const match = pattern.match(/^\/(.+)\/([imsu]*)$/);
  if (match) {
    return new RegExp(match[1], match[2]);
  }
  return new RegExp(pattern);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function typeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

export type Extracted =
  | { ok: true; value: string }
  | { ok: false; error: string };

/**
 * Read a value as a string. Lenient mode stringifies other values,
 * strict mode rejects them.
 */
export function extractString(value: unknown, strict: boolean, what: string): Extracted {
  if (typeof value === "string") {
    return { ok: true, value };
  }
  if (strict) {
    return { ok: false, error: `expected ${what} to be a string, got ${typeName(value)}` };
  }
  return { ok: true, value: stringify(value) };
}

/**
 * Recursive containment: every key of `expected` is present in `actual`
 * with a contained value. Arrays and scalars compare structurally.
 */
export function isSubsetOf(actual: unknown, expected: unknown): boolean {
  if (isRecord(expected)) {
    if (!isRecord(actual)) return false;
    return Object.entries(expected).every(
      ([key, value]) => key in actual && isSubsetOf(actual[key], value)
    );
  }
  return deepEqual(actual, expected);
}

/**
 * Zero values count as empty
 */
export function isEmptyValue(value: unknown): boolean {
  if (value === undefined || value === null || value === "" || value === 0 || value === false) {
    return true;
  }
  if (Array.isArray(value)) return value.length === 0;
  if (isRecord(value)) return Object.keys(value).length === 0;
  return false;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
