export { IssueRecord } from "./issue/issueRecord.js";
export * as issueUpdater from "./issue/issueUpdater.js";
export { applyIssueUpdate, issueUpdateInputSchema, type IssueUpdateInput } from "./issue/issueUpdater.js";
export { MESSAGE_MAX_BYTES, MESSAGE_MAX_LENGTH, WORST_CASE_BYTES_PER_CHAR, truncateMessage } from "./issue/message.js";
export { validateGap, validateLine, validateSeverity, validateStatus } from "./issue/validation.js";
export { ChangeLedger } from "./ledger/changeLedger.js";
export { FieldDiffs, type FieldDiff, type FieldValue } from "./ledger/fieldDiffs.js";
export {
  changeContextFromScan,
  changeContextFromUser,
  withWebhook,
  type ChangeContext,
} from "./schema/changeContext.js";
export { createComment, type IssueComment } from "./schema/comment.js";
export { Duration } from "./schema/duration.js";
export { issueSnapshotSchema, parseIssueSnapshot, type IssueSnapshot } from "./schema/issueSnapshot.js";
export { issueTypeSchema, type IssueType } from "./schema/issueType.js";
export { SEVERITIES, isSeverity, severitySchema, type Severity } from "./schema/severity.js";
export { ERROR_CODES, InvalidArgumentError, IssueLedgerError, UnsupportedOperationError, type ErrorCode } from "./errors.js";
export { loadConfig, type IssueLedgerConfig } from "./config.js";
export { log, logger, setLogLevel, type LogEntry, type LogLevel } from "./logger.js";
