import type { z } from "zod";

import { RuleSetError } from "./errors.js";
import { createMatcher } from "./matcher.js";
import { type RulesDocument, rulesSchema } from "./schema.js";
import type { GroupRule, RuleSet } from "./types.js";

function formatIssuePath(path: readonly PropertyKey[]): string {
  if (path.length === 0) {
    return "(root)";
  }
  return path.map((p) => (typeof p === "symbol" ? (p.description ?? "[symbol]") : String(p))).join(".");
}

/**
 * Render zod issues one per line, for error messages
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `  - ${formatIssuePath(issue.path)}: ${issue.message}`).join("\n");
}

/**
 * Validate raw rule data against the schema
 */
export function validateRules(raw: unknown, source = "rules"): RulesDocument {
  const result = rulesSchema.safeParse(raw);
  if (!result.success) {
    throw new RuleSetError(`Invalid ${source}:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Compile a validated rules document into a frozen rule set
 */
export function compileRules(rules: RulesDocument): RuleSet {
  const groups: GroupRule[] = rules.group_services.map((entry) =>
    Object.freeze({
      name: entry.group,
      matcher: createMatcher({ exact: entry.by_full, patterns: entry.by_regex }),
    })
  );

  return Object.freeze({
    ignorePaths: createMatcher({ prefixes: rules.ignore_paths.by_prefix }),
    catchallUnits: createMatcher({ patterns: rules.catchall_units.by_regex }),
    groups: Object.freeze(groups),
  });
}

/**
 * Validate and compile raw rule data (e.g. a parsed YAML document).
 * Throws RuleSetError listing every problem found.
 */
export function buildRuleSet(raw: unknown, source?: string): RuleSet {
  return compileRules(validateRules(raw, source));
}
