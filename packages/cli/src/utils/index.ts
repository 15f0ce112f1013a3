/**
 * Centralized utilities for the CLI.
 */

export * from "./errors.js";
export * from "./formatting.js";
