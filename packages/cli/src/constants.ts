/**
 * Centralized constants for the restart-triage CLI.
 */

/**
 * Process exit codes
 */
export const ExitCode = {
  SUCCESS: 0,
  RESTART_REQUIRED: 1,
  CONFIG_ERROR: 2,
  RUNTIME_ERROR: 3,
} as const;

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Scanner conventions
 */
export const SCAN = {
  /** Unit value reported for processes outside any unit */
  noUnit: "-",
  /** Source name that means "read from stdin" */
  stdin: "-",
} as const;

/**
 * Output formats accepted by --format
 */
export const OUTPUT_FORMATS = ["text", "json"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
