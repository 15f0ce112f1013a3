import { defineConfig } from "tsup";

export default defineConfig([
  // Library entry
  {
    entry: { index: "src/index.ts" },
    format: ["esm"],
    dts: false,
    clean: true,
    sourcemap: true,
    external: ["@restart-triage/core"],
  },
  // CLI entry (shebang preserved from source)
  {
    entry: { cli: "src/cli.ts" },
    format: ["esm"],
    dts: false,
    sourcemap: true,
    external: ["@restart-triage/core"],
  },
]);
