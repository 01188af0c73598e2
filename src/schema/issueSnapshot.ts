import { z } from "zod";
import { InvalidArgumentError } from "../errors.js";
import { issueTypeSchema } from "./issueType.js";

/**
 * Shape of an issue's field state as handed to or received from a storage
 * collaborator. Range checks (line, gap, status, message length) are left to
 * the record's setters so the error messages stay the same on every path.
 */
export const issueSnapshotSchema = z
  .object({
    key: z.string().optional(),
    type: issueTypeSchema.optional(),
    ruleKey: z.string().optional(),
    componentKey: z.string().optional(),
    projectKey: z.string().optional(),
    status: z.string().optional(),
    resolution: z.string().optional(),
    severity: z.string().optional(),
    manualSeverity: z.boolean().default(false),
    message: z.string().optional(),
    line: z.number().optional(),
    gap: z.number().optional(),
    effortMinutes: z.number().optional(),
    assignee: z.string().optional(),
    authorLogin: z.string().optional(),
    checksum: z.string().optional(),
    creationDate: z.coerce.date().optional(),
    updateDate: z.coerce.date().optional(),
    closeDate: z.coerce.date().optional(),
    selectedAt: z.coerce.date().optional(),
    tags: z.array(z.string()).readonly().default([]),
    codeVariants: z.array(z.string()).readonly().default([]),
    isNew: z.boolean().default(false),
    isCopied: z.boolean().default(false),
    isBeingClosed: z.boolean().default(false),
    isOnDisabledRule: z.boolean().default(false),
    isOnChangedLine: z.boolean().default(false),
    isNewCodeReferenceIssue: z.boolean().default(false),
    isNoLongerNewCodeReferenceIssue: z.boolean().default(false),
    isQuickFixAvailable: z.boolean().default(false),
    isFromExternalRuleEngine: z.boolean().default(false),
    anticipatedTransitionUuid: z.string().optional(),
  })
  .readonly();

export type IssueSnapshot = z.infer<typeof issueSnapshotSchema>;

export function parseIssueSnapshot(input: unknown): IssueSnapshot {
  const parsed = issueSnapshotSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || "snapshot";
    throw new InvalidArgumentError(`Invalid issue snapshot at ${field}: ${issue?.message ?? "unknown error"}`, {
      field,
    });
  }
  return parsed.data;
}
