import * as z from "zod/v4";
import { parseScheduleSection } from "../core/validation.js";
import { bashSingleQuote, joinCommand, parseJobIdToken, whitespaceTokens } from "../submission/shell.js";
import type { CommandInput, SchedulerBackend } from "./types.js";

export const zQsubResources = z.object({
  queue: z.string().min(1),
  threads: z.number().int().min(1),
  extra_parameters: z.string().default("")
});

export const zQsubGeneral = z.object({
  wrapper_script: z.string().min(1)
});

const GENERAL_SECTION = "qsub_general";

export function encodeHoldJid(dependencies: readonly string[] | null): string {
  if (!dependencies || dependencies.length === 0) return "";
  return `-hold_jid ${dependencies.join(",")}`;
}

export function buildQsubCommand(input: CommandInput): string {
  const { job, resolved, config, logFiles, dependencyFlag } = input;
  const resources = parseScheduleSection(zQsubResources, resolved.values, resolved.source);
  const general = parseScheduleSection(zQsubGeneral, config.general(GENERAL_SECTION), GENERAL_SECTION);

  return joinCommand([
    "qsub",
    "-o",
    bashSingleQuote(logFiles.out),
    "-e",
    bashSingleQuote(logFiles.err),
    dependencyFlag,
    "-q",
    resources.queue,
    "-pe",
    "smp",
    resources.threads,
    "-N",
    `snakemake_${job.ruleName}`,
    resources.extra_parameters,
    general.wrapper_script,
    bashSingleQuote(job.scriptPath)
  ]);
}

// qsub answers `Your job 12345 ("name") has been submitted`.
export function extractQsubJobId(output: string): number | null {
  return parseJobIdToken(whitespaceTokens(output)[2]);
}

export const gridEngineBackend: SchedulerBackend = {
  name: "qsub",
  logSuffix: "qsub",
  defaultConfigFile: "config_qsub.json",
  encodeDependencies: encodeHoldJid,
  buildCommand: buildQsubCommand,
  extractJobId: extractQsubJobId
};
