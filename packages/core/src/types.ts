/**
 * Shared types for restart-triage
 */

// =============================================================================
// Matching
// =============================================================================

/** Compiled matching rule: literal prefixes, exact names and anchored patterns */
export interface Matcher {
  readonly prefixes: readonly string[];
  readonly exact: readonly string[];
  readonly patterns: readonly RegExp[];
}

/** Raw matcher entries before compilation */
export interface MatcherInput {
  prefixes?: readonly string[];
  exact?: readonly string[];
  patterns?: readonly string[];
}

// =============================================================================
// Rule Set
// =============================================================================

/** A named risk group and the units that belong to it */
export interface GroupRule {
  readonly name: string;
  readonly matcher: Matcher;
}

/**
 * Immutable rules shared by the path filter and the unit classifier.
 * Groups are kept in declaration order; the first matching group wins.
 */
export interface RuleSet {
  readonly ignorePaths: Matcher;
  readonly catchallUnits: Matcher;
  readonly groups: readonly GroupRule[];
}

/** Group assigned to units that no declared group matches */
export const OTHER_GROUP = "other";

// =============================================================================
// Classification
// =============================================================================

export type ClassificationResult =
  | { readonly kind: "ignored" }
  | { readonly kind: "assigned"; readonly group: string };

export interface UnitClassification {
  unit: string;
  result: ClassificationResult;
}

/** Tag handed to reporters: `ignored` or `group:<name>` */
export type ClassificationTag = "ignored" | `group:${string}`;
