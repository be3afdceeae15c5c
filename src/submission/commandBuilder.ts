import { promises as fs } from "fs";
import path from "path";
import type { LogFiles, SchedulerBackend } from "../backends/types.js";
import type { ResolvedRule, ScheduleConfig } from "../config/scheduleConfig.js";
import type { SubmissionStage } from "../core/stages.js";
import type { JobDescriptor } from "../job/jobDescriptor.js";

export interface BuiltSubmission {
  command: string;
  logFiles: LogFiles;
  resolved: ResolvedRule;
  // directory created (or found) for the first output, null when the job declares no outputs
  outputDir: string | null;
}

export function defaultLogFiles(job: JobDescriptor, suffix: string): LogFiles {
  const first = job.outputPaths[0];
  if (first !== undefined) {
    return { out: `${first}-${suffix}.out`, err: `${first}-${suffix}.err` };
  }
  return {
    out: `snakemake-${job.ruleName}-${suffix}.out`,
    err: `snakemake-${job.ruleName}-${suffix}.err`
  };
}

/**
 * Creates the directory of the first declared output so the scheduler can
 * write its log files next to it. Sibling invocations may race on the same
 * directory; an existing directory is fine.
 */
export async function ensureOutputDirectory(job: JobDescriptor): Promise<string | null> {
  const first = job.outputPaths[0];
  if (first === undefined) return null;
  const dir = path.dirname(path.resolve(first));
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

export async function buildSubmission(input: {
  backend: SchedulerBackend;
  job: JobDescriptor;
  config: ScheduleConfig;
  onStage?: (stage: SubmissionStage) => void;
}): Promise<BuiltSubmission> {
  const { backend, job, config, onStage } = input;

  const resolved = config.resolveRule(job.ruleName);
  onStage?.("config_resolved");

  const outputDir = await ensureOutputDirectory(job);
  onStage?.("directory_ensured");

  const logFiles = defaultLogFiles(job, backend.logSuffix);
  const command = backend.buildCommand({
    job,
    resolved,
    config,
    logFiles,
    dependencyFlag: backend.encodeDependencies(job.dependencies)
  });
  onStage?.("command_built");

  return { command, logFiles, resolved, outputDir };
}
