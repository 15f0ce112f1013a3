/**
 * Shared terminal output helpers.
 */

import chalk from "chalk";

/**
 * Print a warning section on stderr
 *
 * @param title - The warning section title
 * @param warnings - Messages to list under the title
 */
export function printWarnings(title: string, warnings: readonly string[]): void {
  if (warnings.length === 0) {
    return;
  }
  console.error(chalk.yellow(`⚠ ${title}`));
  console.error("─".repeat(50));
  for (const warning of warnings) {
    console.error(`  ${chalk.yellow("!")} ${warning}`);
  }
  console.error("");
}

/**
 * "1 name", "3 names"
 */
export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}
