import type * as z from "zod/v4";
import { ScheduleConfigError } from "./errors.js";

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");
}

export function parseScheduleSection<S extends z.ZodType>(schema: S, value: unknown, label: string): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ScheduleConfigError(`invalid ${label}: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}
