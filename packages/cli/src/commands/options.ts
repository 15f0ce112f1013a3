import { Option } from "commander";

import { OUTPUT_FORMATS, type OutputFormat } from "../constants.js";

export interface RulesOptions {
  rules?: string;
}

export interface OutputOptions extends RulesOptions {
  format: OutputFormat;
}

export interface ReportOptions extends OutputOptions {
  /** Tool version recorded in JSON reports */
  version: string;
}

export function rulesOption(): Option {
  return new Option("-r, --rules <path>", "Rule file (default: nearest restart-triage.yml, then bundled rules)");
}

export function formatOption(): Option {
  return new Option("-f, --format <format>", "Output format").choices(OUTPUT_FORMATS).default("text");
}
