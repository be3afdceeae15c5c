#!/usr/bin/env node
import { gridEngineBackend } from "../src/backends/gridEngine.js";
import { runAdapter } from "../src/cli.js";

async function main(): Promise<void> {
  process.exitCode = await runAdapter(gridEngineBackend, process.argv.slice(2));
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
