import type { ScheduleConfig, ResolvedRule } from "../config/scheduleConfig.js";
import type { JobDescriptor } from "../job/jobDescriptor.js";

export type BackendName = "qsub" | "sbatch";

export interface LogFiles {
  out: string;
  err: string;
}

export interface CommandInput {
  job: JobDescriptor;
  resolved: ResolvedRule;
  config: ScheduleConfig;
  logFiles: LogFiles;
  // output of encodeDependencies for this job; "" when there is nothing to wait for
  dependencyFlag: string;
}

/**
 * What differs between schedulers. Exactly one implementation is picked per
 * process, by the entry script that was invoked.
 */
export interface SchedulerBackend {
  readonly name: BackendName;
  // used in default log file names, e.g. "<output>-slurm.out"
  readonly logSuffix: string;
  readonly defaultConfigFile: string;
  encodeDependencies(dependencies: readonly string[] | null): string;
  buildCommand(input: CommandInput): string;
  extractJobId(output: string): number | null;
}
