import { z } from "zod";

export const severitySchema = z.enum(["INFO", "MINOR", "MAJOR", "CRITICAL", "BLOCKER"]);

export type Severity = z.infer<typeof severitySchema>;

export const SEVERITIES: readonly Severity[] = severitySchema.options;

export function isSeverity(value: string): value is Severity {
  return severitySchema.safeParse(value).success;
}
