/**
 * @restart-triage/core - rule matching and restart-impact classification
 */

// Types
export type {
  ClassificationResult,
  ClassificationTag,
  GroupRule,
  Matcher,
  MatcherInput,
  RuleSet,
  UnitClassification,
} from "./types.js";
export { OTHER_GROUP } from "./types.js";

// Matching
export { compilePattern, createMatcher, EMPTY_MATCHER, isValidPattern, matches } from "./matcher.js";
export { filterPaths, isIgnoredPath } from "./path-filter.js";
export { classifyUnit, classifyUnits, formatClassification, isIgnoredUnit } from "./classifier.js";

// Rules
export { RuleSetError } from "./errors.js";
export type { GroupServicesEntry, RulesDocument } from "./schema.js";
export { rulesSchema } from "./schema.js";
export { buildRuleSet, compileRules, formatIssues, validateRules } from "./ruleset.js";
export {
  DEFAULT_RULES_PATH,
  findRulesFile,
  loadRuleSet,
  parseRuleSet,
  resolveRulesPath,
  RULES_FILE_NAMES,
} from "./loader.js";
export type { LoadRuleSetResult } from "./loader.js";
