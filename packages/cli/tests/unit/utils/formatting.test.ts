import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import chalk from "chalk";
import { pluralize, printWarnings } from "../../../src/utils/formatting.js";

describe("printWarnings", () => {
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    chalk.level = 0;
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it("prints nothing without warnings", () => {
    printWarnings("Warnings", []);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("prints a titled list on stderr", () => {
    printWarnings("Warnings", ["no unit and no exe for 50"]);
    expect(errorSpy.mock.calls).toEqual([
      ["⚠ Warnings"],
      ["─".repeat(50)],
      ["  ! no unit and no exe for 50"],
      [""],
    ]);
  });
});

describe("pluralize", () => {
  it("uses the singular for one", () => {
    expect(pluralize(1, "name")).toBe("1 name");
  });

  it("uses the plural otherwise", () => {
    expect(pluralize(0, "pattern")).toBe("0 patterns");
    expect(pluralize(30, "name")).toBe("30 names");
  });
});
