import { readFile } from "node:fs/promises";

import { formatIssues } from "@restart-triage/core";
import { z } from "zod";

import { SCAN } from "../constants.js";
import { getErrorMessage, ScanInputError } from "../utils/errors.js";

/**
 * Zod schema for the scan document produced by the process scanner
 */
const processRecordSchema = z.object({
  pid: z.number().int().positive(),
  unit: z.string().optional(),
  exe: z.string().optional(),
  user: z.string().optional(),
  paths: z.array(z.string()),
});

const scanDocumentSchema = z.object({
  processes: z.array(processRecordSchema),
});

type RawProcessRecord = z.infer<typeof processRecordSchema>;

/** A process still holding files that have since been replaced or deleted */
export interface ProcessRecord {
  pid: number;
  /** Owning unit; absent when the process runs outside any unit */
  unit?: string;
  /** Executable path */
  exe?: string;
  /** Display name of the owner, e.g. "alice [1000]" */
  user?: string;
  paths: string[];
}

function normalizeRecord(raw: RawProcessRecord): ProcessRecord {
  const record: ProcessRecord = { pid: raw.pid, paths: raw.paths };
  if (raw.unit && raw.unit !== SCAN.noUnit) {
    record.unit = raw.unit;
  }
  if (raw.exe) {
    record.exe = raw.exe;
  }
  if (raw.user) {
    record.user = raw.user;
  }
  return record;
}

/**
 * Parse and validate a scan document
 */
export function parseScanDocument(text: string, source = "scan document"): ProcessRecord[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ScanInputError(`Failed to parse ${source}: ${getErrorMessage(error)}`);
  }

  const result = scanDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new ScanInputError(`Invalid ${source}:\n${formatIssues(result.error)}`);
  }
  return result.data.processes.map(normalizeRecord);
}

async function readStream(input: AsyncIterable<unknown>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/**
 * Read a scan document from a file, or from stdin when the source is
 * omitted or "-"
 */
export async function readScanDocument(
  source?: string,
  stdin: AsyncIterable<unknown> = process.stdin
): Promise<ProcessRecord[]> {
  if (source === undefined || source === SCAN.stdin) {
    return parseScanDocument(await readStream(stdin), "stdin");
  }

  let text: string;
  try {
    text = await readFile(source, "utf-8");
  } catch (error) {
    throw new ScanInputError(`Failed to read ${source}: ${getErrorMessage(error)}`);
  }
  return parseScanDocument(text, source);
}
