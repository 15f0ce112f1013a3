import type { Command } from "commander";

import { formatOption, type OutputOptions, rulesOption, type RulesOptions } from "./options.js";
import { runPaths } from "./paths.js";
import { runReport } from "./report.js";
import { runRules } from "./rules.js";
import { runUnits } from "./units.js";

export { runPaths, runReport, runRules, runUnits };
export { formatRulesSummary } from "./rules.js";

/**
 * Register every command on the given program. The version ends up in
 * JSON reports.
 */
export function registerCommands(program: Command, version: string): void {
  program
    .command("report")
    .description("Report which stale processes need restarting, grouped by risk")
    .argument("[scan-file]", "Scan document (JSON); reads stdin when omitted or '-'")
    .addOption(rulesOption())
    .addOption(formatOption())
    .action(async (scanFile: string | undefined, options: OutputOptions) => {
      process.exitCode = await runReport(scanFile, { ...options, version });
    });

  program
    .command("units")
    .description("Classify unit names")
    .argument("<units...>", "Unit names, e.g. nginx.service")
    .addOption(rulesOption())
    .addOption(formatOption())
    .action((units: string[], options: OutputOptions) => {
      process.exitCode = runUnits(units, options);
    });

  program
    .command("paths")
    .description("Check which paths are ignored")
    .argument("<paths...>", "Paths held by stale processes")
    .addOption(rulesOption())
    .addOption(formatOption())
    .action((paths: string[], options: OutputOptions) => {
      process.exitCode = runPaths(paths, options);
    });

  program
    .command("rules")
    .description("Validate the rule file and summarize it")
    .addOption(rulesOption())
    .action((options: RulesOptions) => {
      process.exitCode = runRules(options);
    });
}
