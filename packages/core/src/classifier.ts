import { matches } from "./matcher.js";
import {
  type ClassificationResult,
  type ClassificationTag,
  OTHER_GROUP,
  type RuleSet,
  type UnitClassification,
} from "./types.js";

const IGNORED: ClassificationResult = Object.freeze({ kind: "ignored" });

/**
 * Classify a unit name.
 *
 * A catchall match always wins. Otherwise groups are scanned in declaration
 * order and the first one that matches is assigned, falling back to
 * {@link OTHER_GROUP}. Every string gets exactly one result.
 */
export function classifyUnit(ruleSet: RuleSet, unit: string): ClassificationResult {
  if (matches(ruleSet.catchallUnits, unit)) {
    return IGNORED;
  }

  for (const group of ruleSet.groups) {
    if (matches(group.matcher, unit)) {
      return { kind: "assigned", group: group.name };
    }
  }

  return { kind: "assigned", group: OTHER_GROUP };
}

/**
 * Classify a batch of units, preserving input order
 */
export function classifyUnits(ruleSet: RuleSet, units: readonly string[]): UnitClassification[] {
  return units.map((unit) => ({ unit, result: classifyUnit(ruleSet, unit) }));
}

export function isIgnoredUnit(ruleSet: RuleSet, unit: string): boolean {
  return classifyUnit(ruleSet, unit).kind === "ignored";
}

export function formatClassification(result: ClassificationResult): ClassificationTag {
  return result.kind === "ignored" ? "ignored" : `group:${result.group}`;
}
