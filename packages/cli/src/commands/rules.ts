import chalk from "chalk";

import { loadRuleSet, OTHER_GROUP, type RuleSet } from "@restart-triage/core";

import { ExitCode, type ExitCodeType } from "../constants.js";
import { handleError, pluralize } from "../utils/index.js";
import type { RulesOptions } from "./options.js";

/**
 * Summarize a rule set, groups in the order they are checked
 */
export function formatRulesSummary(ruleSet: RuleSet, rulesPath: string): string {
  const lines = [
    `Rules: ${rulesPath}`,
    `Ignored path prefixes: ${ruleSet.ignorePaths.prefixes.length}`,
    `Catchall unit patterns: ${ruleSet.catchallUnits.patterns.length}`,
    "Groups (first match wins):",
  ];
  ruleSet.groups.forEach((group, index) => {
    const names = pluralize(group.matcher.exact.length, "name");
    const patterns = pluralize(group.matcher.patterns.length, "pattern");
    lines.push(`  ${index + 1}. ${chalk.bold(group.name)}: ${names}, ${patterns}`);
  });
  lines.push(`  ${chalk.dim(`${OTHER_GROUP}: everything else`)}`);
  return lines.join("\n");
}

/**
 * Validate the rule file and print its summary
 */
export function runRules(options: RulesOptions): ExitCodeType {
  try {
    const { ruleSet, rulesPath } = loadRuleSet(options.rules);
    process.stdout.write(`${formatRulesSummary(ruleSet, rulesPath)}\n`);
    return ExitCode.SUCCESS;
  } catch (error) {
    return handleError(error);
  }
}
