/**
 * @restart-triage/cli - restart reports for stale processes
 */

export { ExitCode, type ExitCodeType, OUTPUT_FORMATS, type OutputFormat } from "./constants.js";
export { parseScanDocument, type ProcessRecord, readScanDocument } from "./scan/input.js";
export {
  buildReport,
  type RestartGroup,
  type RestartReport,
  type UnitRestart,
  type UnmanagedExecutable,
  type UnmanagedProcess,
} from "./report/builder.js";
export { formatJson, formatReport, formatText, type ReportOutput } from "./report/format.js";
export {
  formatRulesSummary,
  registerCommands,
  runPaths,
  runReport,
  runRules,
  runUnits,
} from "./commands/index.js";
export { getErrorMessage, handleError, ScanInputError } from "./utils/index.js";
