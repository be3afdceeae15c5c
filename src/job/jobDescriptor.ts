import { promises as fs } from "fs";
import * as z from "zod/v4";
import { MetadataError, UsageError } from "../core/errors.js";
import { formatZodIssues } from "../core/validation.js";

const PROPERTIES_LINE = /^# properties = (.*)$/;

export const zJobProperties = z.object({
  rule: z.string().min(1),
  input: z.array(z.string()),
  output: z.array(z.string())
});

export type JobProperties = z.infer<typeof zJobProperties>;

export interface JobDescriptor {
  readonly scriptPath: string;
  readonly ruleName: string;
  readonly inputPaths: readonly string[];
  readonly outputPaths: readonly string[];
  // null means "no dependency"; otherwise at least one id, in the order given.
  readonly dependencies: readonly string[] | null;
}

/**
 * Reads the metadata the workflow engine embeds in a generated job script as a
 * single `# properties = {...}` JSON line.
 */
export async function readJobProperties(scriptPath: string): Promise<JobProperties> {
  let text: string;
  try {
    text = await fs.readFile(scriptPath, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MetadataError(`unable to read job script ${scriptPath}: ${reason}`);
  }

  let payload: string | null = null;
  for (const line of text.split(/\r?\n/)) {
    const m = PROPERTIES_LINE.exec(line);
    if (m && m[1] !== undefined) {
      payload = m[1];
      break;
    }
  }
  if (payload === null) {
    throw new MetadataError(`job script ${scriptPath} has no "# properties" line`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MetadataError(`job properties in ${scriptPath} are not valid JSON: ${reason}`);
  }

  const parsed = zJobProperties.safeParse(raw);
  if (!parsed.success) {
    throw new MetadataError(`job properties in ${scriptPath} lack rule/input/output: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function normalizeDependencies(ids: readonly string[] | null | undefined): readonly string[] | null {
  if (!ids || ids.length < 1) return null;
  const blank = ids.findIndex((id) => id.trim().length === 0);
  if (blank >= 0) throw new UsageError(`dependency id #${blank + 1} is empty`);
  return Object.freeze([...ids]);
}

export async function loadJobDescriptor(input: {
  scriptPath: string;
  dependencies?: readonly string[] | null;
}): Promise<JobDescriptor> {
  const props = await readJobProperties(input.scriptPath);
  return Object.freeze({
    scriptPath: input.scriptPath,
    ruleName: props.rule,
    inputPaths: Object.freeze([...props.input]),
    outputPaths: Object.freeze([...props.output]),
    dependencies: normalizeDependencies(input.dependencies)
  });
}
