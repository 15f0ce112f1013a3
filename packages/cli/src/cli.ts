#!/usr/bin/env node

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import { Command, type CommanderError } from "commander";
import { z } from "zod";

import { registerCommands } from "./commands/index.js";
import { ExitCode } from "./constants.js";

// src/cli.ts and the bundled dist/cli.js both sit one level below package.json
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const packageJsonPath = path.resolve(__dirname, "..", "package.json");
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(fs.readFileSync(packageJsonPath, "utf-8")));
const VERSION = packageJson.version;

/**
 * Map Commander's argument errors to CONFIG_ERROR; help and version keep
 * Commander's own exit code.
 */
function configureExitOverride(cmd: Command): Command {
  return cmd.exitOverride((err: CommanderError) => {
    if (
      err.code === "commander.invalidArgument" ||
      err.code === "commander.optionMissingArgument" ||
      err.code === "commander.missingArgument"
    ) {
      process.exit(ExitCode.CONFIG_ERROR);
    }
    process.exit(err.exitCode);
  });
}

const program = new Command();

configureExitOverride(program)
  .name("restart-triage")
  .description("Decide which stale services to restart, and how risky that is")
  .version(VERSION);

registerCommands(program, VERSION);

await program.parseAsync();
