/**
 * Provenance of a change: when it happened and who (or what) made it.
 * Diff records copy their authorship metadata from here.
 */
export interface ChangeContext {
  date: Date;
  userUuid?: string;
  externalUser?: string;
  webhookSource?: string;
  /** True when the change comes from an analysis run rather than a person. */
  scan: boolean;
}

export function changeContextFromUser(date: Date, userUuid?: string): ChangeContext {
  return { date, userUuid, scan: false };
}

export function changeContextFromScan(date: Date): ChangeContext {
  return { date, scan: true };
}

export function withWebhook(context: ChangeContext, externalUser: string, webhookSource: string): ChangeContext {
  return { ...context, externalUser, webhookSource };
}
