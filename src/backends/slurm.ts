import * as z from "zod/v4";
import { parseScheduleSection } from "../core/validation.js";
import { bashSingleQuote, joinCommand, parseJobIdToken, whitespaceTokens } from "../submission/shell.js";
import type { CommandInput, SchedulerBackend } from "./types.js";

export const zSbatchResources = z.object({
  partition: z.string().min(1),
  cores: z.number().int().min(1),
  days: z.number().int().min(0),
  hours: z.number().int().min(0),
  minutes: z.number().int().min(0),
  extra_parameters: z.string().default("")
});

export const zSbatchGeneral = z.object({
  wrapper_script: z.string().min(1),
  account: z.string().min(1)
});

const GENERAL_SECTION = "sbatch_general";

export type SbatchResources = z.infer<typeof zSbatchResources>;

export function encodeAfterOk(dependencies: readonly string[] | null): string {
  if (!dependencies || dependencies.length === 0) return "";
  return `-d ${dependencies.map((id) => `afterok:${id}`).join(",")}`;
}

export function formatTimeLimit(resources: Pick<SbatchResources, "days" | "hours" | "minutes">): string {
  return `${resources.days}-${resources.hours}:${resources.minutes}:00`;
}

export function buildSbatchCommand(input: CommandInput): string {
  const { job, resolved, config, logFiles, dependencyFlag } = input;
  const resources = parseScheduleSection(zSbatchResources, resolved.values, resolved.source);
  const general = parseScheduleSection(zSbatchGeneral, config.general(GENERAL_SECTION), GENERAL_SECTION);

  return joinCommand([
    "sbatch",
    `--output=${bashSingleQuote(logFiles.out)}`,
    `--error=${bashSingleQuote(logFiles.err)}`,
    dependencyFlag,
    "-A",
    general.account,
    "-p",
    resources.partition,
    "-n",
    resources.cores,
    "-t",
    formatTimeLimit(resources),
    "-J",
    `snakemake_${job.ruleName}`,
    resources.extra_parameters,
    general.wrapper_script,
    bashSingleQuote(job.scriptPath)
  ]);
}

// sbatch answers `Submitted batch job 12345`.
export function extractSbatchJobId(output: string): number | null {
  return parseJobIdToken(whitespaceTokens(output).at(-1));
}

export const slurmBackend: SchedulerBackend = {
  name: "sbatch",
  logSuffix: "slurm",
  defaultConfigFile: "config_sbatch.json",
  encodeDependencies: encodeAfterOk,
  buildCommand: buildSbatchCommand,
  extractJobId: extractSbatchJobId
};
