/**
 * Error types and helpers shared by the CLI commands.
 */

import chalk from "chalk";

import { RuleSetError } from "@restart-triage/core";

import { ExitCode, type ExitCodeType } from "../constants.js";

/**
 * Raised when a scan document cannot be read, parsed or validated
 */
export class ScanInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScanInputError";
  }
}

/**
 * Get a human-readable error message from an unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "Unknown error";
}

/**
 * Report an error on stderr and pick the exit code for it
 */
export function handleError(error: unknown): ExitCodeType {
  if (error instanceof RuleSetError) {
    console.error(chalk.red(`Rules error: ${error.message}`));
    return ExitCode.CONFIG_ERROR;
  }
  if (error instanceof ScanInputError) {
    console.error(chalk.red(`Scan input error: ${error.message}`));
    return ExitCode.RUNTIME_ERROR;
  }
  console.error(chalk.red(`Error: ${getErrorMessage(error)}`));
  return ExitCode.RUNTIME_ERROR;
}
