import { describe, it, expect } from "vitest";
import { rulesSchema } from "../../src/schema.js";

const minimal = {
  ignore_paths: { by_prefix: [] },
  catchall_units: { by_regex: [] },
  group_services: [],
};

describe("rulesSchema", () => {
  it("validates a minimal rule file", () => {
    const result = rulesSchema.safeParse(minimal);
    expect(result.success).toBe(true);
  });

  it("defaults matcher lists to empty", () => {
    const result = rulesSchema.safeParse({
      ignore_paths: {},
      catchall_units: {},
      group_services: [{ group: "safe" }],
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.ignore_paths.by_prefix).toEqual([]);
      expect(result.data.group_services[0]).toEqual({ group: "safe", by_full: [], by_regex: [] });
    }
  });

  it("keeps group declaration order", () => {
    const result = rulesSchema.safeParse({
      ...minimal,
      group_services: [{ group: "scary" }, { group: "safe" }, { group: "blip" }],
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.group_services.map((g) => g.group)).toEqual(["scary", "safe", "blip"]);
    }
  });

  it("rejects unknown top-level keys", () => {
    const result = rulesSchema.safeParse({ ...minimal, restart_commands: {} });
    expect(result.success).toBe(false);
  });

  it("rejects an exact list for catchall units", () => {
    const result = rulesSchema.safeParse({
      ...minimal,
      catchall_units: { by_full: ["init.scope"] },
    });
    expect(result.success).toBe(false);
  });

  it("rejects regexes for ignored paths", () => {
    const result = rulesSchema.safeParse({
      ...minimal,
      ignore_paths: { by_regex: ["/proc/.*"] },
    });
    expect(result.success).toBe(false);
  });

  it("requires every section", () => {
    const result = rulesSchema.safeParse({ ignore_paths: {}, catchall_units: {} });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(["group_services"]);
    }
  });

  it("requires a group name", () => {
    const result = rulesSchema.safeParse({ ...minimal, group_services: [{ by_full: ["a.service"] }] });
    expect(result.success).toBe(false);
  });

  it("rejects invalid regular expressions", () => {
    const result = rulesSchema.safeParse({
      ...minimal,
      group_services: [{ group: "blip", by_regex: ["tomcat(\\d\\.service"] }],
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toHaveLength(1);
      expect(result.error.issues[0].path).toEqual(["group_services", 0, "by_regex", 0]);
      expect(result.error.issues[0].message).toContain('Invalid regular expression: "tomcat(\\d\\.service"');
    }
  });

  it("rejects invalid catchall regular expressions", () => {
    const result = rulesSchema.safeParse({ ...minimal, catchall_units: { by_regex: ["*.scope"] } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(["catchall_units", "by_regex", 0]);
    }
  });

  it("rejects duplicate group names", () => {
    const result = rulesSchema.safeParse({
      ...minimal,
      group_services: [{ group: "safe" }, { group: "blip" }, { group: "safe" }],
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toHaveLength(1);
      expect(result.error.issues[0].path).toEqual(["group_services", 2, "group"]);
      expect(result.error.issues[0].message).toBe('Duplicate group name "safe"');
    }
  });

  it("reserves the other group", () => {
    const result = rulesSchema.safeParse({ ...minimal, group_services: [{ group: "other" }] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('"other" is reserved for units no group matches');
    }
  });

  it("rejects empty prefixes", () => {
    const result = rulesSchema.safeParse({ ...minimal, ignore_paths: { by_prefix: ["/tmp/", ""] } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(["ignore_paths", "by_prefix", 1]);
      expect(result.error.issues[0].message).toBe("must not be empty");
    }
  });

  it("rejects non-string entries", () => {
    const result = rulesSchema.safeParse({ ...minimal, group_services: [{ group: "safe", by_full: [42] }] });
    expect(result.success).toBe(false);
  });
});
