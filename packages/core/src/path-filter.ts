import { matches } from "./matcher.js";
import type { RuleSet } from "./types.js";

/**
 * True if the path starts with one of the rule set's ignored prefixes.
 * Prefixes are compared literally and case-sensitively.
 */
export function isIgnoredPath(ruleSet: RuleSet, path: string): boolean {
  return matches(ruleSet.ignorePaths, path);
}

/**
 * Drop ignored paths, keeping the remaining ones in their original order
 */
export function filterPaths(ruleSet: RuleSet, paths: readonly string[]): string[] {
  return paths.filter((path) => !isIgnoredPath(ruleSet, path));
}
