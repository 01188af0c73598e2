import { InvalidArgumentError } from "../errors.js";
import { isSeverity, type Severity } from "../schema/severity.js";

/** Renders a number the way a floating-point field prints it: `-1` becomes `-1.0`. */
function formatDecimal(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function validateStatus(value: string | undefined): string | undefined {
  if (value !== undefined && value.length === 0) {
    throw new InvalidArgumentError("Status must be set", { field: "status" });
  }
  return value;
}

export function validateSeverity(value: string | undefined): Severity | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isSeverity(value)) {
    throw new InvalidArgumentError(`Not a valid severity: ${value}`, { field: "severity", value });
  }
  return value;
}

export function validateLine(value: number | undefined): number | undefined {
  if (value !== undefined && (!Number.isInteger(value) || value <= 0)) {
    throw new InvalidArgumentError(`Line must be null or greater than zero (got ${value})`, {
      field: "line",
      value,
    });
  }
  return value;
}

export function validateGap(value: number | undefined): number | undefined {
  if (value !== undefined && (Number.isNaN(value) || value < 0)) {
    throw new InvalidArgumentError(`Gap must be greater than or equal 0 (got ${formatDecimal(value)})`, {
      field: "gap",
      value,
    });
  }
  return value;
}
