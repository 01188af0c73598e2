import { InvalidArgumentError } from "../errors.js";

/**
 * Remediation effort, held at minute resolution.
 */
export class Duration {
  private constructor(private readonly minutes: number) {}

  static create(minutes: number): Duration {
    if (!Number.isInteger(minutes) || minutes < 0) {
      throw new InvalidArgumentError(
        `Duration must be a non-negative integer number of minutes (got ${minutes})`,
        { field: "effort", value: minutes },
      );
    }
    return new Duration(minutes);
  }

  toMinutes(): number {
    return this.minutes;
  }

  add(other: Duration): Duration {
    return new Duration(this.minutes + other.minutes);
  }

  isGreaterThan(other: Duration): boolean {
    return this.minutes > other.minutes;
  }

  equals(other: unknown): boolean {
    return other instanceof Duration && other.minutes === this.minutes;
  }

  toString(): string {
    return `${this.minutes}min`;
  }
}
