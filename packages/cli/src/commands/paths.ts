import { isIgnoredPath, loadRuleSet } from "@restart-triage/core";

import { ExitCode, type ExitCodeType } from "../constants.js";
import { handleError } from "../utils/index.js";
import type { OutputOptions } from "./options.js";

export function runPaths(paths: string[], options: OutputOptions): ExitCodeType {
  try {
    const { ruleSet } = loadRuleSet(options.rules);
    const rows = paths.map((path) => ({ path, ignored: isIgnoredPath(ruleSet, path) }));

    const output =
      options.format === "json"
        ? JSON.stringify(rows, null, 2)
        : rows.map(({ path, ignored }) => `${path}\t${ignored ? "ignored" : "significant"}`).join("\n");
    process.stdout.write(`${output}\n`);

    return ExitCode.SUCCESS;
  } catch (error) {
    return handleError(error);
  }
}
