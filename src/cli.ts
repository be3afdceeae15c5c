import { submitJob } from "./adapter.js";
import type { SchedulerBackend } from "./backends/types.js";
import { CONFIG_PATH_ENV, ScheduleConfig, resolveConfigPath } from "./config/scheduleConfig.js";
import { AdapterError, UsageError } from "./core/errors.js";
import { stderrLog, type DiagnosticLog } from "./core/log.js";
import { ShellSubmitter, type JobSubmitter } from "./submission/submitter.js";

export interface CliArgs {
  help: boolean;
  configPath?: string;
  dependencies: string[];
  scriptPath: string | null;
}

export interface CliStreams {
  stdout: (text: string) => void;
  stderr: DiagnosticLog;
}

export interface RunAdapterDeps {
  streams?: CliStreams;
  submitter?: JobSubmitter;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export function usage(backend: SchedulerBackend): string {
  return [
    "usage:",
    `  submit_${backend.name} [--config <file>] [dependency-id ...] <job-script>`,
    "",
    "notes:",
    `  - config defaults to $${CONFIG_PATH_ENV}, then ./${backend.defaultConfigFile}`,
    "  - prints the scheduler job id alone on stdout",
    ""
  ].join("\n");
}

export function parseCliArgs(argv: string[]): CliArgs {
  const positionals: string[] = [];
  let help = false;
  let configPath: string | undefined;
  let optionsDone = false;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === undefined) continue;
    if (optionsDone || !a.startsWith("-") || a === "-") {
      positionals.push(a);
      continue;
    }
    if (a === "--") {
      optionsDone = true;
      continue;
    }
    if (a === "--help" || a === "-h") {
      help = true;
      continue;
    }
    if (a.startsWith("--config=")) {
      configPath = a.slice("--config=".length);
      if (!configPath) throw new UsageError("missing value for --config");
      continue;
    }
    if (a === "--config") {
      const next = argv[i + 1];
      if (!next || next.startsWith("--")) throw new UsageError("missing value for --config");
      configPath = next;
      i++;
      continue;
    }
    throw new UsageError(`unexpected arg: ${a}`);
  }

  const scriptPath = positionals.pop() ?? null;
  return { help, configPath, dependencies: positionals, scriptPath };
}

const defaultStreams: CliStreams = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: stderrLog
};

/**
 * Entry point shared by the per-scheduler scripts. Resolves to the process
 * exit status; on success the only thing written to stdout is the job id.
 */
export async function runAdapter(backend: SchedulerBackend, argv: string[], deps: RunAdapterDeps = {}): Promise<number> {
  const streams = deps.streams ?? defaultStreams;
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      streams.stderr(usage(backend));
      return 0;
    }
    if (!args.scriptPath) {
      throw new UsageError(`job script path is required\n\n${usage(backend)}`);
    }

    const configPath = resolveConfigPath({
      explicitPath: args.configPath,
      env: deps.env ?? process.env,
      cwd: deps.cwd ?? process.cwd(),
      defaultFileName: backend.defaultConfigFile
    });
    const config = await ScheduleConfig.loadFromFile(configPath);

    const outcome = await submitJob({
      backend,
      config,
      scriptPath: args.scriptPath,
      dependencies: args.dependencies,
      submitter: deps.submitter ?? new ShellSubmitter(),
      log: streams.stderr
    });
    streams.stdout(`${outcome.jobId}\n`);
    return 0;
  } catch (err) {
    if (err instanceof AdapterError) {
      streams.stderr(err.message);
      return err.exitStatus;
    }
    streams.stderr(err instanceof Error ? err.message : String(err));
    return 1;
  }
}
