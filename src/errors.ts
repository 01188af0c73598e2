/**
 * Error taxonomy for issue records.
 *
 * Every failure carries a machine-readable `code` and optional structured
 * `details`. Validation failures are programmer or data errors and are never
 * retried.
 */

export const ERROR_CODES = {
  INVALID_ARGUMENT: "INVALID_ARGUMENT",
  UNSUPPORTED_OPERATION: "UNSUPPORTED_OPERATION",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class IssueLedgerError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A value was rejected before it reached stored state. */
export class InvalidArgumentError extends IssueLedgerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ERROR_CODES.INVALID_ARGUMENT, message, details);
  }
}

/** A caller tried to mutate a read-only view. */
export class UnsupportedOperationError extends IssueLedgerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ERROR_CODES.UNSUPPORTED_OPERATION, message, details);
  }
}
