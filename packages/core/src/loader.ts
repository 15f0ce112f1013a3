import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import { parse } from "yaml";

import { RuleSetError } from "./errors.js";
import { buildRuleSet } from "./ruleset.js";
import type { RuleSet } from "./types.js";

/** Rule file names, in order of precedence */
export const RULES_FILE_NAMES = ["restart-triage.yml", "restart-triage.yaml"] as const;

/** Rules shipped with the package, used when no rule file is found */
export const DEFAULT_RULES_PATH = fileURLToPath(new URL("../rules/default.yml", import.meta.url));

export interface LoadRuleSetResult {
  ruleSet: RuleSet;
  rulesPath: string;
}

function findInDirectory(dir: string): string | null {
  for (const name of RULES_FILE_NAMES) {
    const candidate = path.join(dir, name);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Find a rule file by walking up the directory tree
 */
export function findRulesFile(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir);
  const root = path.parse(currentDir).root;

  while (currentDir !== root) {
    const found = findInDirectory(currentDir);
    if (found) {
      return found;
    }
    currentDir = path.dirname(currentDir);
  }

  return findInDirectory(root);
}

/**
 * Pick the rule file to load: an explicit path, then the nearest rule file,
 * then the bundled defaults. Always returns an absolute path.
 */
export function resolveRulesPath(rulesPath?: string, cwd: string = process.cwd()): string {
  if (rulesPath !== undefined) {
    const absolutePath = path.resolve(cwd, rulesPath);
    if (!fs.existsSync(absolutePath)) {
      throw new RuleSetError(`Rule file not found: ${rulesPath}`);
    }
    return absolutePath;
  }
  return findRulesFile(cwd) ?? DEFAULT_RULES_PATH;
}

/**
 * Parse and build a rule set from YAML text
 */
export function parseRuleSet(text: string, source = "rules"): RuleSet {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    throw new RuleSetError(`Failed to parse ${source}: ${message}`);
  }
  return buildRuleSet(raw, source);
}

/**
 * Load, validate and compile a rule file
 */
export function loadRuleSet(rulesPath?: string): LoadRuleSetResult {
  const resolvedPath = resolveRulesPath(rulesPath);

  let text: string;
  try {
    text = fs.readFileSync(resolvedPath, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    throw new RuleSetError(`Failed to read ${resolvedPath}: ${message}`);
  }

  return { ruleSet: parseRuleSet(text, resolvedPath), rulesPath: resolvedPath };
}
