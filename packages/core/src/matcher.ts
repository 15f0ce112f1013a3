import type { Matcher, MatcherInput } from "./types.js";

/**
 * Compile a rule pattern so it only matches whole strings.
 *
 * The raw pattern must compile on its own, so `a)|(b` cannot close the
 * anchor group. Compiled with the `u` flag: `.` matches a whole code point.
 * Throws a SyntaxError on an invalid pattern.
 */
export function compilePattern(source: string): RegExp {
  new RegExp(source, "u");
  return new RegExp(`^(?:${source})$`, "u");
}

/**
 * Check that a pattern compiles.
 */
export function isValidPattern(source: string): { valid: boolean; error?: string } {
  try {
    compilePattern(source);
    return { valid: true };
  } catch (error) {
    const message = error instanceof Error ? error.message : "Invalid regular expression";
    return { valid: false, error: message };
  }
}

/**
 * Build a frozen matcher from raw prefixes, exact names and patterns
 */
export function createMatcher(input: MatcherInput = {}): Matcher {
  return Object.freeze({
    prefixes: Object.freeze([...(input.prefixes ?? [])]),
    exact: Object.freeze([...new Set(input.exact ?? [])]),
    patterns: Object.freeze((input.patterns ?? []).map(compilePattern)),
  });
}

/** A matcher that matches nothing */
export const EMPTY_MATCHER: Matcher = createMatcher();

/**
 * True if the candidate starts with a prefix, equals an exact entry,
 * or fully matches a pattern. The empty string never matches.
 */
export function matches(matcher: Matcher, candidate: string): boolean {
  if (candidate.length === 0) {
    return false;
  }

  if (matcher.prefixes.some((prefix) => candidate.startsWith(prefix))) {
    return true;
  }

  if (matcher.exact.includes(candidate)) {
    return true;
  }

  return matcher.patterns.some((pattern) => pattern.test(candidate));
}
