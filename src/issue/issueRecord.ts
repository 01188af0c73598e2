import { ChangeLedger } from "../ledger/changeLedger.js";
import type { FieldDiffs, FieldValue } from "../ledger/fieldDiffs.js";
import { readonlyArrayView } from "../readonlyView.js";
import type { ChangeContext } from "../schema/changeContext.js";
import type { IssueComment } from "../schema/comment.js";
import { Duration } from "../schema/duration.js";
import type { IssueSnapshot } from "../schema/issueSnapshot.js";
import type { IssueType } from "../schema/issueType.js";
import type { Severity } from "../schema/severity.js";
import { truncateMessage } from "./message.js";
import { validateGap, validateLine, validateSeverity, validateStatus } from "./validation.js";

interface IssueProps {
  key?: string;
  type?: IssueType;
  ruleKey?: string;
  componentKey?: string;
  projectKey?: string;
  status?: string;
  resolution?: string;
  severity?: Severity;
  manualSeverity: boolean;
  message?: string;
  line?: number;
  gap?: number;
  effort?: Duration;
  assignee?: string;
  authorLogin?: string;
  checksum?: string;
  creationDate?: Date;
  updateDate?: Date;
  closeDate?: Date;
  selectedAt?: Date;
  tags?: Set<string>;
  codeVariants?: Set<string>;
  isNew: boolean;
  isCopied: boolean;
  isBeingClosed: boolean;
  isOnDisabledRule: boolean;
  isChanged: boolean;
  sendNotifications: boolean;
  isOnChangedLine: boolean;
  isNewCodeReferenceIssue: boolean;
  isNoLongerNewCodeReferenceIssue: boolean;
  isQuickFixAvailable: boolean;
  isFromExternalRuleEngine: boolean;
  anticipatedTransitionUuid?: string;
}

function hashString(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(31, hash) + value.charCodeAt(i)) | 0;
  }
  return hash;
}

/**
 * One code-quality issue, mutated in place by the single workflow that owns
 * it. Setters validate before storing and leave the record untouched when
 * they throw. Identity is the key alone.
 */
export class IssueRecord {
  private readonly props: IssueProps = {
    manualSeverity: false,
    isNew: false,
    isCopied: false,
    isBeingClosed: false,
    isOnDisabledRule: false,
    isChanged: false,
    sendNotifications: false,
    isOnChangedLine: false,
    isNewCodeReferenceIssue: false,
    isNoLongerNewCodeReferenceIssue: false,
    isQuickFixAvailable: false,
    isFromExternalRuleEngine: false,
  };

  private readonly commentList: IssueComment[] = [];
  private readonly ledger = new ChangeLedger(() => this.props.key);

  get key(): string | undefined {
    return this.props.key;
  }

  setKey(key: string | undefined): void {
    this.props.key = key;
  }

  get type(): IssueType | undefined {
    return this.props.type;
  }

  setType(type: IssueType | undefined): void {
    this.props.type = type;
  }

  get ruleKey(): string | undefined {
    return this.props.ruleKey;
  }

  setRuleKey(ruleKey: string | undefined): void {
    this.props.ruleKey = ruleKey;
  }

  get componentKey(): string | undefined {
    return this.props.componentKey;
  }

  setComponentKey(componentKey: string | undefined): void {
    this.props.componentKey = componentKey;
  }

  get projectKey(): string | undefined {
    return this.props.projectKey;
  }

  setProjectKey(projectKey: string | undefined): void {
    this.props.projectKey = projectKey;
  }

  get status(): string | undefined {
    return this.props.status;
  }

  setStatus(status: string | undefined): void {
    this.props.status = validateStatus(status);
  }

  get resolution(): string | undefined {
    return this.props.resolution;
  }

  setResolution(resolution: string | undefined): void {
    this.props.resolution = resolution;
  }

  get severity(): Severity | undefined {
    return this.props.severity;
  }

  setSeverity(severity: string | undefined): void {
    this.props.severity = validateSeverity(severity);
  }

  get manualSeverity(): boolean {
    return this.props.manualSeverity;
  }

  setManualSeverity(manualSeverity: boolean): void {
    this.props.manualSeverity = manualSeverity;
  }

  /** Always undefined; characteristics are no longer attached to issues. */
  characteristic(): undefined {
    return undefined;
  }

  get message(): string | undefined {
    return this.props.message;
  }

  setMessage(message: string | undefined): void {
    this.props.message = truncateMessage(message);
  }

  get line(): number | undefined {
    return this.props.line;
  }

  setLine(line: number | undefined): void {
    this.props.line = validateLine(line);
  }

  get gap(): number | undefined {
    return this.props.gap;
  }

  setGap(gap: number | undefined): void {
    this.props.gap = validateGap(gap);
  }

  get effort(): Duration | undefined {
    return this.props.effort;
  }

  setEffort(effort: Duration | undefined): void {
    this.props.effort = effort;
  }

  effortInMinutes(): number | undefined {
    return this.props.effort?.toMinutes();
  }

  get checksum(): string | undefined {
    return this.props.checksum;
  }

  setChecksum(checksum: string | undefined): void {
    this.props.checksum = checksum;
  }

  get assignee(): string | undefined {
    return this.props.assignee;
  }

  setAssignee(assignee: string | undefined): void {
    this.props.assignee = assignee;
  }

  get authorLogin(): string | undefined {
    return this.props.authorLogin;
  }

  setAuthorLogin(authorLogin: string | undefined): void {
    this.props.authorLogin = authorLogin;
  }

  get creationDate(): Date | undefined {
    return this.props.creationDate;
  }

  setCreationDate(date: Date | undefined): void {
    this.props.creationDate = date;
  }

  get updateDate(): Date | undefined {
    return this.props.updateDate;
  }

  setUpdateDate(date: Date | undefined): void {
    this.props.updateDate = date;
  }

  get closeDate(): Date | undefined {
    return this.props.closeDate;
  }

  setCloseDate(date: Date | undefined): void {
    this.props.closeDate = date;
  }

  get selectedAt(): Date | undefined {
    return this.props.selectedAt;
  }

  setSelectedAt(date: Date | undefined): void {
    this.props.selectedAt = date;
  }

  get tags(): ReadonlySet<string> {
    return new Set(this.props.tags);
  }

  setTags(tags: Iterable<string> | undefined): void {
    this.props.tags = tags === undefined ? undefined : new Set(tags);
  }

  get codeVariants(): ReadonlySet<string> {
    return new Set(this.props.codeVariants);
  }

  setCodeVariants(codeVariants: Iterable<string> | undefined): void {
    this.props.codeVariants = codeVariants === undefined ? undefined : new Set(codeVariants);
  }

  get isNew(): boolean {
    return this.props.isNew;
  }

  setNew(isNew: boolean): void {
    this.props.isNew = isNew;
  }

  get isCopied(): boolean {
    return this.props.isCopied;
  }

  setCopied(isCopied: boolean): void {
    this.props.isCopied = isCopied;
  }

  get isBeingClosed(): boolean {
    return this.props.isBeingClosed;
  }

  setBeingClosed(isBeingClosed: boolean): void {
    this.props.isBeingClosed = isBeingClosed;
  }

  get isOnDisabledRule(): boolean {
    return this.props.isOnDisabledRule;
  }

  setOnDisabledRule(isOnDisabledRule: boolean): void {
    this.props.isOnDisabledRule = isOnDisabledRule;
  }

  get isChanged(): boolean {
    return this.props.isChanged;
  }

  setChanged(isChanged: boolean): void {
    this.props.isChanged = isChanged;
  }

  get mustSendNotifications(): boolean {
    return this.props.sendNotifications;
  }

  setSendNotifications(sendNotifications: boolean): void {
    this.props.sendNotifications = sendNotifications;
  }

  get isOnChangedLine(): boolean {
    return this.props.isOnChangedLine;
  }

  setIsOnChangedLine(isOnChangedLine: boolean): void {
    this.props.isOnChangedLine = isOnChangedLine;
  }

  get isNewCodeReferenceIssue(): boolean {
    return this.props.isNewCodeReferenceIssue;
  }

  setIsNewCodeReferenceIssue(isNewCodeReferenceIssue: boolean): void {
    this.props.isNewCodeReferenceIssue = isNewCodeReferenceIssue;
  }

  get isNoLongerNewCodeReferenceIssue(): boolean {
    return this.props.isNoLongerNewCodeReferenceIssue;
  }

  setIsNoLongerNewCodeReferenceIssue(isNoLongerNewCodeReferenceIssue: boolean): void {
    this.props.isNoLongerNewCodeReferenceIssue = isNoLongerNewCodeReferenceIssue;
  }

  get isQuickFixAvailable(): boolean {
    return this.props.isQuickFixAvailable;
  }

  setQuickFixAvailable(isQuickFixAvailable: boolean): void {
    this.props.isQuickFixAvailable = isQuickFixAvailable;
  }

  get isFromExternalRuleEngine(): boolean {
    return this.props.isFromExternalRuleEngine;
  }

  setFromExternalRuleEngine(isFromExternalRuleEngine: boolean): void {
    this.props.isFromExternalRuleEngine = isFromExternalRuleEngine;
  }

  /**
   * True only for an issue on a changed line that is not a new-code reference
   * issue and has not stopped being one.
   */
  isToBeMigratedAsNewCodeReferenceIssue(): boolean {
    return (
      this.props.isOnChangedLine &&
      !this.props.isNewCodeReferenceIssue &&
      !this.props.isNoLongerNewCodeReferenceIssue
    );
  }

  get anticipatedTransitionUuid(): string | undefined {
    return this.props.anticipatedTransitionUuid;
  }

  setAnticipatedTransitionUuid(uuid: string | undefined): void {
    this.props.anticipatedTransitionUuid = uuid;
  }

  get comments(): readonly IssueComment[] {
    return readonlyArrayView(this.commentList, "issue comments");
  }

  addComment(comment: IssueComment): void {
    this.commentList.push(comment);
  }

  get changes(): readonly FieldDiffs[] {
    return this.ledger.changes;
  }

  get currentChange(): FieldDiffs | undefined {
    return this.ledger.currentChange;
  }

  /**
   * Records `field` going from `oldValue` to `newValue`, merged into the
   * current diff record when there is one.
   */
  setFieldChange(context: ChangeContext, field: string, oldValue: FieldValue, newValue: FieldValue): void {
    this.ledger.recordFieldChange(context, field, oldValue, newValue);
  }

  addChange(diffs: FieldDiffs | null | undefined): void {
    this.ledger.append(diffs);
  }

  startNewChange(): void {
    this.ledger.startNewChange();
  }

  equals(other: unknown): boolean {
    if (this === other) {
      return true;
    }
    return other instanceof IssueRecord && other.props.key === this.props.key;
  }

  hashCode(): number {
    return this.props.key === undefined ? 0 : hashString(this.props.key);
  }

  toString(): string {
    return `IssueRecord(${this.props.key ?? "<no key>"})`;
  }

  toSnapshot(): IssueSnapshot {
    const p = this.props;
    return Object.freeze({
      key: p.key,
      type: p.type,
      ruleKey: p.ruleKey,
      componentKey: p.componentKey,
      projectKey: p.projectKey,
      status: p.status,
      resolution: p.resolution,
      severity: p.severity,
      manualSeverity: p.manualSeverity,
      message: p.message,
      line: p.line,
      gap: p.gap,
      effortMinutes: p.effort?.toMinutes(),
      assignee: p.assignee,
      authorLogin: p.authorLogin,
      checksum: p.checksum,
      creationDate: p.creationDate,
      updateDate: p.updateDate,
      closeDate: p.closeDate,
      selectedAt: p.selectedAt,
      tags: Object.freeze([...(p.tags ?? [])]),
      codeVariants: Object.freeze([...(p.codeVariants ?? [])]),
      isNew: p.isNew,
      isCopied: p.isCopied,
      isBeingClosed: p.isBeingClosed,
      isOnDisabledRule: p.isOnDisabledRule,
      isOnChangedLine: p.isOnChangedLine,
      isNewCodeReferenceIssue: p.isNewCodeReferenceIssue,
      isNoLongerNewCodeReferenceIssue: p.isNoLongerNewCodeReferenceIssue,
      isQuickFixAvailable: p.isQuickFixAvailable,
      isFromExternalRuleEngine: p.isFromExternalRuleEngine,
      anticipatedTransitionUuid: p.anticipatedTransitionUuid,
    });
  }

  /** Rebuilds a record through the validated setters. Comments and changes are not part of a snapshot. */
  static fromSnapshot(snapshot: IssueSnapshot): IssueRecord {
    const issue = new IssueRecord();
    issue.setKey(snapshot.key);
    issue.setType(snapshot.type);
    issue.setRuleKey(snapshot.ruleKey);
    issue.setComponentKey(snapshot.componentKey);
    issue.setProjectKey(snapshot.projectKey);
    issue.setStatus(snapshot.status);
    issue.setResolution(snapshot.resolution);
    issue.setSeverity(snapshot.severity);
    issue.setManualSeverity(snapshot.manualSeverity);
    issue.setMessage(snapshot.message);
    issue.setLine(snapshot.line);
    issue.setGap(snapshot.gap);
    issue.setEffort(snapshot.effortMinutes === undefined ? undefined : Duration.create(snapshot.effortMinutes));
    issue.setAssignee(snapshot.assignee);
    issue.setAuthorLogin(snapshot.authorLogin);
    issue.setChecksum(snapshot.checksum);
    issue.setCreationDate(snapshot.creationDate);
    issue.setUpdateDate(snapshot.updateDate);
    issue.setCloseDate(snapshot.closeDate);
    issue.setSelectedAt(snapshot.selectedAt);
    issue.setTags(snapshot.tags);
    issue.setCodeVariants(snapshot.codeVariants);
    issue.setNew(snapshot.isNew);
    issue.setCopied(snapshot.isCopied);
    issue.setBeingClosed(snapshot.isBeingClosed);
    issue.setOnDisabledRule(snapshot.isOnDisabledRule);
    issue.setIsOnChangedLine(snapshot.isOnChangedLine);
    issue.setIsNewCodeReferenceIssue(snapshot.isNewCodeReferenceIssue);
    issue.setIsNoLongerNewCodeReferenceIssue(snapshot.isNoLongerNewCodeReferenceIssue);
    issue.setQuickFixAvailable(snapshot.isQuickFixAvailable);
    issue.setFromExternalRuleEngine(snapshot.isFromExternalRuleEngine);
    issue.setAnticipatedTransitionUuid(snapshot.anticipatedTransitionUuid);
    return issue;
  }
}
