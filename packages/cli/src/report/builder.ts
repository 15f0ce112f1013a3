import { classifyUnit, filterPaths, type RuleSet } from "@restart-triage/core";

import type { ProcessRecord } from "../scan/input.js";

/** Units of one risk group, restartable in one go */
export interface RestartGroup {
  group: string;
  units: string[];
}

/** A unit and the stale paths its processes hold */
export interface UnitRestart {
  unit: string;
  group: string;
  paths: string[];
}

export interface UnmanagedProcess {
  pid: number;
  user?: string;
}

/** Processes of one executable that run outside any useful unit */
export interface UnmanagedExecutable {
  exe: string;
  processes: UnmanagedProcess[];
  paths: string[];
}

export interface RestartReport {
  groups: RestartGroup[];
  units: UnitRestart[];
  executables: UnmanagedExecutable[];
  /** Some stale process belonged to a catchall unit */
  nonUnitProcesses: boolean;
  /** Something still holds a significant stale path */
  restartRequired: boolean;
  warnings: string[];
}

interface ExecutableEntry {
  processes: Map<number, UnmanagedProcess>;
  paths: Set<string>;
}

const byNumber = (a: number, b: number): number => a - b;
const byKey = <T>([a]: [string, T], [b]: [string, T]): number => (a < b ? -1 : a > b ? 1 : 0);

function addAll<T>(target: Set<T>, values: Iterable<T>): void {
  for (const value of values) {
    target.add(value);
  }
}

/**
 * Build the restart report for a set of stale processes.
 *
 * Ignored paths are dropped first; processes left with nothing are not
 * reported. Processes in a classified unit are reported by unit, everything
 * else by executable. Output is sorted so it does not depend on scan order.
 */
export function buildReport(ruleSet: RuleSet, processes: readonly ProcessRecord[]): RestartReport {
  const groups = new Map<string, Set<string>>();
  const units = new Map<string, { group: string; paths: Set<string> }>();
  const executables = new Map<string, ExecutableEntry>();
  const warnings: string[] = [];
  let nonUnitProcesses = false;
  let stale = 0;

  for (const record of processes) {
    const paths = filterPaths(ruleSet, record.paths);
    if (paths.length === 0) {
      continue;
    }
    stale++;

    if (record.unit !== undefined) {
      const result = classifyUnit(ruleSet, record.unit);
      if (result.kind === "assigned") {
        const members = groups.get(result.group) ?? new Set<string>();
        members.add(record.unit);
        groups.set(result.group, members);

        const entry = units.get(record.unit) ?? { group: result.group, paths: new Set<string>() };
        addAll(entry.paths, paths);
        units.set(record.unit, entry);
        continue;
      }
      nonUnitProcesses = true;
    }

    if (record.exe === undefined) {
      warnings.push(`no unit and no exe for ${record.pid}`);
      continue;
    }

    const entry = executables.get(record.exe) ?? {
      processes: new Map<number, UnmanagedProcess>(),
      paths: new Set<string>(),
    };
    entry.processes.set(
      record.pid,
      record.user === undefined ? { pid: record.pid } : { pid: record.pid, user: record.user }
    );
    addAll(entry.paths, paths);
    executables.set(record.exe, entry);
  }

  return {
    groups: [...groups.entries()]
      .sort(byKey)
      .map(([group, members]) => ({ group, units: [...members].sort() })),
    units: [...units.entries()]
      .sort(byKey)
      .map(([unit, entry]) => ({ unit, group: entry.group, paths: [...entry.paths].sort() })),
    executables: [...executables.entries()].sort(byKey).map(([exe, entry]) => ({
      exe,
      processes: [...entry.processes.values()].sort((a, b) => byNumber(a.pid, b.pid)),
      paths: [...entry.paths].sort(),
    })),
    nonUnitProcesses,
    restartRequired: stale > 0,
    warnings,
  };
}
