import chalk from "chalk";

import type { OutputFormat } from "../constants.js";
import type { RestartReport, UnmanagedExecutable } from "./builder.js";

/** Report plus the context it was produced in */
export interface ReportOutput extends RestartReport {
  version: string;
  rulesPath: string;
}

/**
 * Format output as JSON
 */
export function formatJson(output: ReportOutput): string {
  return JSON.stringify(output, null, 2);
}

function formatGroups(report: RestartReport): string[] {
  const lines: string[] = [];
  for (const { group, units } of report.groups) {
    lines.push(` * ${chalk.bold(group)}`);
    lines.push(`   - ${chalk.cyan(`sudo systemctl restart ${units.join(" ")}`)}`);
  }
  if (report.groups.length === 0) {
    lines.push(chalk.green("No units need restarting."));
  }
  if (report.nonUnitProcesses) {
    lines.push(chalk.yellow("Some pids not associated with units need restarting."));
  }
  return lines;
}

function formatUnits(report: RestartReport): string[] {
  if (report.units.length === 0) {
    return [];
  }
  const lines = ["These units need restarting:"];
  for (const { unit, group, paths } of report.units) {
    lines.push(` * ${chalk.bold(unit)} ${chalk.dim(`(${group})`)}`);
    lines.push(...paths.map((path) => `   - ${path}`));
  }
  return lines;
}

function formatExecutable(entry: UnmanagedExecutable): string[] {
  const lines = [` * ${chalk.bold(entry.exe)}`, "   - pids:"];
  for (const { pid, user } of entry.processes) {
    lines.push(user ? `     - ${pid} (${user})` : `     - ${pid}`);
  }
  lines.push("   - paths:");
  lines.push(...entry.paths.map((path) => `     - ${path}`));
  return lines;
}

function formatExecutables(report: RestartReport): string[] {
  if (report.executables.length === 0) {
    return [];
  }
  const lines = ["These executables have processes running outside of useful units:"];
  for (const entry of report.executables) {
    lines.push(...formatExecutable(entry));
  }
  return lines;
}

/**
 * Format output as human-readable text
 */
export function formatText(report: RestartReport): string {
  return [...formatGroups(report), ...formatUnits(report), ...formatExecutables(report)].join("\n");
}

/**
 * Format result based on output format
 */
export function formatReport(output: ReportOutput, format: OutputFormat): string {
  switch (format) {
    case "json":
      return formatJson(output);
    case "text":
    default:
      return formatText(output);
  }
}
