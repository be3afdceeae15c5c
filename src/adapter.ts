import type { SchedulerBackend } from "./backends/types.js";
import type { ScheduleConfig } from "./config/scheduleConfig.js";
import { SubmissionIdUnparseable } from "./core/errors.js";
import { stderrLog, type DiagnosticLog } from "./core/log.js";
import type { SubmissionStage } from "./core/stages.js";
import { loadJobDescriptor, type JobDescriptor } from "./job/jobDescriptor.js";
import { buildSubmission } from "./submission/commandBuilder.js";
import type { JobSubmitter } from "./submission/submitter.js";

export interface SubmitJobInput {
  backend: SchedulerBackend;
  config: ScheduleConfig;
  scriptPath: string;
  dependencies?: readonly string[] | null;
  submitter: JobSubmitter;
  log?: DiagnosticLog;
  onStage?: (stage: SubmissionStage) => void;
}

export interface SubmitJobOutcome {
  jobId: number;
  command: string;
  job: JobDescriptor;
  rawOutput: string;
}

/**
 * One job, one submission: read the job metadata, resolve its resources,
 * submit once and recover the scheduler's job id. Anything that fails before
 * submission leaves the scheduler untouched.
 */
export async function submitJob(input: SubmitJobInput): Promise<SubmitJobOutcome> {
  const log = input.log ?? stderrLog;
  const onStage = input.onStage ?? (() => undefined);
  onStage("start");

  const job = await loadJobDescriptor({ scriptPath: input.scriptPath, dependencies: input.dependencies });
  onStage("metadata_parsed");

  const built = await buildSubmission({ backend: input.backend, job, config: input.config, onStage });

  log(built.command);
  const res = await input.submitter.submit(built.command);
  onStage("submitted");

  if (res.exitStatus !== 0) {
    log(`${input.backend.name} exited with status ${res.exitStatus ?? "unknown"}`);
  }

  const jobId = input.backend.extractJobId(res.output);
  if (jobId === null) {
    throw new SubmissionIdUnparseable(res.output);
  }
  onStage("id_extracted");

  return { jobId, command: built.command, job, rawOutput: res.output };
}
