import { describe, it, expect } from "vitest";
import { buildReport } from "../../../src/report/builder.js";
import type { ProcessRecord } from "../../../src/scan/input.js";
import { testRuleSet } from "../fixtures.js";

const ruleSet = testRuleSet();

const processes: ProcessRecord[] = [
  { pid: 10, unit: "nginx.service", exe: "/usr/sbin/nginx", paths: ["/usr/lib/libssl.so.3", "/proc/10/maps"] },
  { pid: 11, unit: "nginx.service", paths: ["/usr/lib/libcrypto.so.3"] },
  { pid: 20, unit: "cron.service", paths: ["/tmp/cron.lock"] },
  { pid: 30, unit: "session-1.scope", exe: "/usr/bin/vim", user: "alice [1000]", paths: ["/usr/lib/libc.so.6"] },
  { pid: 25, exe: "/usr/bin/vim", paths: ["/usr/lib/libm.so.6"] },
  { pid: 40, unit: "myapp.service", paths: ["/opt/myapp/lib.so"] },
  { pid: 50, paths: ["/usr/lib/libz.so.1"] },
  { pid: 60, unit: "php8.2-fpm.service", paths: ["[heap]"] },
];

describe("buildReport", () => {
  const report = buildReport(ruleSet, processes);

  it("groups units by risk, sorted by group name", () => {
    expect(report.groups).toEqual([
      { group: "blip", units: ["nginx.service"] },
      { group: "other", units: ["myapp.service"] },
    ]);
  });

  it("skips units whose paths are all ignored", () => {
    expect(report.groups.flatMap((g) => g.units)).not.toContain("cron.service");
    expect(report.groups.flatMap((g) => g.units)).not.toContain("php8.2-fpm.service");
  });

  it("collects the significant paths of every process in a unit", () => {
    expect(report.units).toEqual([
      { unit: "myapp.service", group: "other", paths: ["/opt/myapp/lib.so"] },
      { unit: "nginx.service", group: "blip", paths: ["/usr/lib/libcrypto.so.3", "/usr/lib/libssl.so.3"] },
    ]);
  });

  it("reports catchall and unit-less processes by executable", () => {
    expect(report.executables).toEqual([
      {
        exe: "/usr/bin/vim",
        processes: [{ pid: 25 }, { pid: 30, user: "alice [1000]" }],
        paths: ["/usr/lib/libc.so.6", "/usr/lib/libm.so.6"],
      },
    ]);
    expect(report.nonUnitProcesses).toBe(true);
  });

  it("warns about processes with neither unit nor executable", () => {
    expect(report.warnings).toEqual(["no unit and no exe for 50"]);
  });

  it("requires a restart", () => {
    expect(report.restartRequired).toBe(true);
  });

  it("does not depend on scan order", () => {
    expect(buildReport(ruleSet, [...processes].reverse())).toEqual(report);
  });

  it("returns an empty report for no processes", () => {
    expect(buildReport(ruleSet, [])).toEqual({
      groups: [],
      units: [],
      executables: [],
      nonUnitProcesses: false,
      restartRequired: false,
      warnings: [],
    });
  });

  it("does not require a restart when every path is ignored", () => {
    const quiet = buildReport(ruleSet, [{ pid: 1, unit: "nginx.service", paths: ["/proc/1/maps"] }]);
    expect(quiet.restartRequired).toBe(false);
    expect(quiet.groups).toEqual([]);
  });

  it("still requires a restart for a process it can only warn about", () => {
    const lone = buildReport(ruleSet, [{ pid: 5, paths: ["/usr/lib/libz.so.1"] }]);
    expect(lone.restartRequired).toBe(true);
    expect(lone.warnings).toEqual(["no unit and no exe for 5"]);
  });
});
