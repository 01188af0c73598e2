import { ReadonlyMapView } from "../readonlyView.js";
import type { ChangeContext } from "../schema/changeContext.js";

export type FieldValue = string | number | boolean | undefined;

export interface FieldDiff {
  readonly oldValue: FieldValue;
  readonly newValue: FieldValue;
}

/**
 * One grouped change: the (old, new) pair of every field touched, plus who
 * made the change and when.
 */
export class FieldDiffs {
  private readonly entries = new Map<string, FieldDiff>();

  userUuid?: string;
  externalUser?: string;
  webhookSource?: string;
  creationDate?: Date;
  issueKey?: string;

  get(field: string): FieldDiff | undefined {
    return this.entries.get(field);
  }

  get diffs(): ReadonlyMap<string, FieldDiff> {
    return new ReadonlyMapView(this.entries, "field diffs");
  }

  /** Inserts the entry, replacing any earlier one for the same field. */
  setDiff(field: string, oldValue: FieldValue, newValue: FieldValue): void {
    this.entries.set(field, { oldValue, newValue });
  }

  stamp(context: ChangeContext): void {
    this.userUuid = context.userUuid;
    this.externalUser = context.externalUser;
    this.webhookSource = context.webhookSource;
    this.creationDate = context.date;
  }

  isEmpty(): boolean {
    return this.entries.size === 0;
  }
}
