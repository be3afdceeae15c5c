#!/usr/bin/env node
import { slurmBackend } from "../src/backends/slurm.js";
import { runAdapter } from "../src/cli.js";

async function main(): Promise<void> {
  process.exitCode = await runAdapter(slurmBackend, process.argv.slice(2));
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
