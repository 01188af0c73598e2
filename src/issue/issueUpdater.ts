import { z } from "zod";
import { InvalidArgumentError } from "../errors.js";
import type { FieldValue } from "../ledger/fieldDiffs.js";
import { logger } from "../logger.js";
import type { ChangeContext } from "../schema/changeContext.js";
import { createComment, type IssueComment } from "../schema/comment.js";
import { Duration } from "../schema/duration.js";
import { issueTypeSchema, type IssueType } from "../schema/issueType.js";
import type { IssueRecord } from "./issueRecord.js";
import { truncateMessage } from "./message.js";
import { validateGap, validateLine, validateSeverity, validateStatus } from "./validation.js";

export const SEVERITY = "severity";
export const TYPE = "type";
export const ASSIGNEE = "assignee";
export const STATUS = "status";
export const RESOLUTION = "resolution";
export const LINE = "line";
export const GAP = "gap";
export const EFFORT = "effort";
export const TAGS = "tags";
export const CODE_VARIANTS = "codeVariants";

function touch(issue: IssueRecord, context: ChangeContext): void {
  issue.setUpdateDate(context.date);
  issue.setChanged(true);
}

function recordChange(
  issue: IssueRecord,
  context: ChangeContext,
  field: string,
  oldValue: FieldValue,
  newValue: FieldValue,
): void {
  issue.setFieldChange(context, field, oldValue, newValue);
  touch(issue, context);
  logger.debug("Recorded field change", "issueUpdater", { issueKey: issue.key, field });
}

function normalizeValues(values: Iterable<string>): string[] {
  const trimmed = Array.from(values, (value) => value.trim()).filter((value) => value.length > 0);
  const unique = Array.from(new Set(trimmed));
  unique.sort((a, b) => a.localeCompare(b));
  return unique;
}

function joinValues(values: readonly string[]): string | undefined {
  return values.length === 0 ? undefined : values.join(" ");
}

export function setSeverity(issue: IssueRecord, severity: string | undefined, context: ChangeContext): boolean {
  const next = validateSeverity(severity);
  const previous = issue.severity;
  if (previous === next) {
    return false;
  }
  recordChange(issue, context, SEVERITY, previous, next);
  issue.setSeverity(next);
  return true;
}

/** Sets the severity and marks it as chosen by a person. */
export function setManualSeverity(issue: IssueRecord, severity: string, context: ChangeContext): boolean {
  const next = validateSeverity(severity);
  if (issue.manualSeverity && issue.severity === next) {
    return false;
  }
  recordChange(issue, context, SEVERITY, issue.severity, next);
  issue.setSeverity(next);
  issue.setManualSeverity(true);
  return true;
}

export function setType(issue: IssueRecord, type: IssueType, context: ChangeContext): boolean {
  const previous = issue.type;
  if (previous === type) {
    return false;
  }
  recordChange(issue, context, TYPE, previous, type);
  issue.setType(type);
  return true;
}

export function assign(issue: IssueRecord, userUuid: string | undefined, context: ChangeContext): boolean {
  const previous = issue.assignee;
  if (previous === userUuid) {
    return false;
  }
  recordChange(issue, context, ASSIGNEE, previous, userUuid);
  issue.setAssignee(userUuid);
  return true;
}

export function setStatus(issue: IssueRecord, status: string, context: ChangeContext): boolean {
  const next = validateStatus(status);
  const previous = issue.status;
  if (previous === next) {
    return false;
  }
  recordChange(issue, context, STATUS, previous, next);
  issue.setStatus(next);
  return true;
}

export function setResolution(issue: IssueRecord, resolution: string | undefined, context: ChangeContext): boolean {
  const previous = issue.resolution;
  if (previous === resolution) {
    return false;
  }
  recordChange(issue, context, RESOLUTION, previous, resolution);
  issue.setResolution(resolution);
  return true;
}

/** Message edits mark the issue changed but leave no diff entry. */
export function setMessage(issue: IssueRecord, message: string | undefined, context: ChangeContext): boolean {
  const next = truncateMessage(message);
  if (issue.message === next) {
    return false;
  }
  issue.setMessage(next);
  touch(issue, context);
  return true;
}

export function setLine(issue: IssueRecord, line: number | undefined, context: ChangeContext): boolean {
  const next = validateLine(line);
  const previous = issue.line;
  if (previous === next) {
    return false;
  }
  recordChange(issue, context, LINE, previous, next);
  issue.setLine(next);
  return true;
}

export function setGap(issue: IssueRecord, gap: number | undefined, context: ChangeContext): boolean {
  const next = validateGap(gap);
  const previous = issue.gap;
  if (previous === next) {
    return false;
  }
  recordChange(issue, context, GAP, previous, next);
  issue.setGap(next);
  return true;
}

export function setEffort(issue: IssueRecord, effort: Duration | undefined, context: ChangeContext): boolean {
  const previous = issue.effortInMinutes();
  const next = effort?.toMinutes();
  if (previous === next) {
    return false;
  }
  recordChange(issue, context, EFFORT, previous, next);
  issue.setEffort(effort);
  return true;
}

export function setTags(issue: IssueRecord, tags: Iterable<string>, context: ChangeContext): boolean {
  const next = normalizeValues(tags);
  const previous = joinValues(normalizeValues(issue.tags));
  const joined = joinValues(next);
  if (previous === joined) {
    return false;
  }
  recordChange(issue, context, TAGS, previous, joined);
  issue.setTags(next);
  return true;
}

export function setCodeVariants(issue: IssueRecord, codeVariants: Iterable<string>, context: ChangeContext): boolean {
  const next = normalizeValues(codeVariants);
  const previous = joinValues(normalizeValues(issue.codeVariants));
  const joined = joinValues(next);
  if (previous === joined) {
    return false;
  }
  recordChange(issue, context, CODE_VARIANTS, previous, joined);
  issue.setCodeVariants(next);
  return true;
}

export function addComment(issue: IssueRecord, markdownText: string, context: ChangeContext): IssueComment {
  const comment = createComment(issue.key, markdownText, context);
  issue.addComment(comment);
  touch(issue, context);
  return comment;
}

// `null` clears a field; an omitted field is left as it is.
export const issueUpdateInputSchema = z
  .object({
    severity: z.string().optional(),
    manualSeverity: z.boolean().optional(),
    type: issueTypeSchema.optional(),
    assignee: z.string().trim().nullable().optional(),
    status: z.string().optional(),
    resolution: z.string().trim().nullable().optional(),
    message: z.string().nullable().optional(),
    line: z.number().nullable().optional(),
    gap: z.number().nullable().optional(),
    effortMinutes: z.number().nullable().optional(),
    tags: z.array(z.string()).optional(),
    codeVariants: z.array(z.string()).optional(),
    comment: z.string().trim().min(1, "Comment must not be empty").optional(),
  })
  .strict()
  .refine((update) => !update.manualSeverity || update.severity !== undefined, {
    message: "A manual severity needs a severity",
    path: ["manualSeverity"],
  });

export type IssueUpdateInput = z.infer<typeof issueUpdateInputSchema>;

function orUndefined<T>(value: T | null): T | undefined {
  return value === null ? undefined : value;
}

/**
 * Applies a partial update and returns the names of the fields that changed.
 * Every value is validated before anything is written, so a rejected update
 * leaves the issue as it was.
 */
export function applyIssueUpdate(issue: IssueRecord, input: unknown, context: ChangeContext): string[] {
  const parsed = issueUpdateInputSchema.safeParse(input);
  if (!parsed.success) {
    const problem = parsed.error.issues[0];
    const field = problem?.path.join(".") || "input";
    logger.warn("Rejected issue update", "issueUpdater", { issueKey: issue.key, field });
    throw new InvalidArgumentError(`Invalid issue update at ${field}: ${problem?.message ?? "unknown error"}`, {
      field,
    });
  }

  const update = parsed.data;
  const severity = validateSeverity(update.severity);
  const status = validateStatus(update.status);
  const line = update.line === undefined ? undefined : validateLine(orUndefined(update.line));
  const gap = update.gap === undefined ? undefined : validateGap(orUndefined(update.gap));
  const effort =
    update.effortMinutes === undefined || update.effortMinutes === null
      ? undefined
      : Duration.create(update.effortMinutes);

  const changed: string[] = [];
  const track = (field: string, didChange: boolean) => {
    if (didChange) {
      changed.push(field);
    }
  };

  if (severity !== undefined) {
    track(
      SEVERITY,
      update.manualSeverity ? setManualSeverity(issue, severity, context) : setSeverity(issue, severity, context),
    );
  }
  if (update.type !== undefined) {
    track(TYPE, setType(issue, update.type, context));
  }
  if (update.assignee !== undefined) {
    track(ASSIGNEE, assign(issue, orUndefined(update.assignee) || undefined, context));
  }
  if (status !== undefined) {
    track(STATUS, setStatus(issue, status, context));
  }
  if (update.resolution !== undefined) {
    track(RESOLUTION, setResolution(issue, orUndefined(update.resolution) || undefined, context));
  }
  if (update.message !== undefined) {
    track("message", setMessage(issue, orUndefined(update.message), context));
  }
  if (update.line !== undefined) {
    track(LINE, setLine(issue, line, context));
  }
  if (update.gap !== undefined) {
    track(GAP, setGap(issue, gap, context));
  }
  if (update.effortMinutes !== undefined) {
    track(EFFORT, setEffort(issue, effort, context));
  }
  if (update.tags !== undefined) {
    track(TAGS, setTags(issue, update.tags, context));
  }
  if (update.codeVariants !== undefined) {
    track(CODE_VARIANTS, setCodeVariants(issue, update.codeVariants, context));
  }
  if (update.comment !== undefined) {
    addComment(issue, update.comment, context);
    changed.push("comment");
  }

  return changed;
}
