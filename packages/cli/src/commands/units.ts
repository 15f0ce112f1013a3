import { classifyUnits, formatClassification, loadRuleSet } from "@restart-triage/core";

import { ExitCode, type ExitCodeType } from "../constants.js";
import { handleError } from "../utils/index.js";
import type { OutputOptions } from "./options.js";

export function runUnits(units: string[], options: OutputOptions): ExitCodeType {
  try {
    const { ruleSet } = loadRuleSet(options.rules);
    const rows = classifyUnits(ruleSet, units).map(({ unit, result }) => ({
      unit,
      classification: formatClassification(result),
    }));

    const output =
      options.format === "json"
        ? JSON.stringify(rows, null, 2)
        : rows.map(({ unit, classification }) => `${unit}\t${classification}`).join("\n");
    process.stdout.write(`${output}\n`);

    return ExitCode.SUCCESS;
  } catch (error) {
    return handleError(error);
  }
}
