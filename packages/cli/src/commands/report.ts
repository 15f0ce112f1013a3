import { loadRuleSet } from "@restart-triage/core";

import { ExitCode, type ExitCodeType } from "../constants.js";
import { buildReport } from "../report/builder.js";
import { formatReport } from "../report/format.js";
import { readScanDocument } from "../scan/input.js";
import { handleError, printWarnings } from "../utils/index.js";
import type { ReportOptions } from "./options.js";

/**
 * Classify a scan document and print what needs restarting.
 * Exits with RESTART_REQUIRED when any process still holds a stale path.
 */
export async function runReport(
  scanFile: string | undefined,
  options: ReportOptions
): Promise<ExitCodeType> {
  try {
    const { ruleSet, rulesPath } = loadRuleSet(options.rules);
    const processes = await readScanDocument(scanFile);
    const report = buildReport(ruleSet, processes);

    process.stdout.write(`${formatReport({ version: options.version, rulesPath, ...report }, options.format)}\n`);
    printWarnings("Warnings", report.warnings);

    return report.restartRequired ? ExitCode.RESTART_REQUIRED : ExitCode.SUCCESS;
  } catch (error) {
    return handleError(error);
  }
}
