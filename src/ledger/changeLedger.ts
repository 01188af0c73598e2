import { logger } from "../logger.js";
import { readonlyArrayView } from "../readonlyView.js";
import type { ChangeContext } from "../schema/changeContext.js";
import { FieldDiffs, type FieldValue } from "./fieldDiffs.js";

/**
 * Chronological list of diff records for one issue.
 *
 * Field changes made in the same session collapse into the diff record the
 * session opened. That record is tracked by position; the list is
 * append-only so the position never dangles.
 */
export class ChangeLedger {
  private readonly records: FieldDiffs[] = [];
  private currentIndex: number | undefined;

  constructor(private readonly issueKey: () => string | undefined) {}

  get changes(): readonly FieldDiffs[] {
    return readonlyArrayView(this.records, "issue changes");
  }

  get currentChange(): FieldDiffs | undefined {
    return this.records.at(-1);
  }

  recordFieldChange(context: ChangeContext, field: string, oldValue: FieldValue, newValue: FieldValue): void {
    if (oldValue === newValue) {
      return;
    }

    const existing = this.currentIndex === undefined ? undefined : this.records[this.currentIndex];
    const current = existing ?? new FieldDiffs();
    current.setDiff(field, oldValue, newValue);
    current.stamp(context);

    if (!existing) {
      current.issueKey = this.issueKey();
      this.records.push(current);
      this.currentIndex = this.records.length - 1;
      logger.debug("Opened diff record", "changeLedger", {
        issueKey: current.issueKey,
        position: this.currentIndex,
      });
    }
  }

  /**
   * Appends an already-authored diff record as it is. It never becomes the
   * merge target, so later field changes cannot rewrite its authorship.
   */
  append(diffs: FieldDiffs | null | undefined): void {
    if (!diffs) {
      return;
    }
    this.records.push(diffs);
  }

  /** The next field change opens a new diff record. */
  startNewChange(): void {
    this.currentIndex = undefined;
  }
}
