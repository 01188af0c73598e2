import { describe, expect, it } from "vitest";
import { IssueRecord } from "../src/issue/issueRecord.js";
import { MESSAGE_MAX_LENGTH } from "../src/issue/message.js";
import { FieldDiffs } from "../src/ledger/fieldDiffs.js";
import { changeContextFromUser, withWebhook } from "../src/schema/changeContext.js";
import { createComment } from "../src/schema/comment.js";
import { Duration } from "../src/schema/duration.js";
import { SEVERITIES } from "../src/schema/severity.js";
import { InvalidArgumentError, UnsupportedOperationError } from "../src/errors.js";
import { exactly } from "./helpers.js";

const context = changeContextFromUser(new Date("2024-03-01T12:00:00.000Z"), "user-1");

function issueWithKey(key: string): IssueRecord {
  const issue = new IssueRecord();
  issue.setKey(key);
  return issue;
}

describe("IssueRecord", () => {
  describe("dates", () => {
    it("reads back each cleared timestamp as undefined", () => {
      const issue = new IssueRecord();
      issue.setCreationDate(undefined);
      issue.setUpdateDate(undefined);
      issue.setCloseDate(undefined);
      issue.setSelectedAt(undefined);

      expect(issue.creationDate).toBeUndefined();
      expect(issue.updateDate).toBeUndefined();
      expect(issue.closeDate).toBeUndefined();
      expect(issue.selectedAt).toBeUndefined();
    });

    it("keeps the timestamps independent of each other", () => {
      const issue = new IssueRecord();
      const created = new Date("2024-01-01T00:00:00.000Z");
      issue.setCreationDate(created);
      issue.setCloseDate(undefined);

      expect(issue.creationDate).toBe(created);
      expect(issue.closeDate).toBeUndefined();
      expect(issue.updateDate).toBeUndefined();
    });
  });

  describe("status", () => {
    it("rejects an empty status", () => {
      const issue = new IssueRecord();
      expect(() => issue.setStatus("")).toThrow(InvalidArgumentError);
      expect(() => issue.setStatus("")).toThrow(exactly("Status must be set"));
    });

    it("stores any non-empty status unchanged", () => {
      const issue = new IssueRecord();
      issue.setStatus("IN_REVIEW");
      expect(issue.status).toBe("IN_REVIEW");
    });

    it("leaves the previous status when the new one is rejected", () => {
      const issue = new IssueRecord();
      issue.setStatus("OPEN");
      expect(() => issue.setStatus("")).toThrow(InvalidArgumentError);
      expect(issue.status).toBe("OPEN");
    });
  });

  describe("severity", () => {
    it("rejects a value outside the severity set", () => {
      const issue = new IssueRecord();
      expect(() => issue.setSeverity("FOO")).toThrow(exactly("Not a valid severity: FOO"));
      expect(issue.severity).toBeUndefined();
    });

    it.each(SEVERITIES)("accepts %s", (severity) => {
      const issue = new IssueRecord();
      issue.setSeverity(severity);
      expect(issue.severity).toBe(severity);
    });
  });

  describe("message", () => {
    it("cuts a long message to the storage budget", () => {
      const issue = new IssueRecord();
      issue.setMessage("a".repeat(5_000));
      expect(issue.message).toHaveLength(1_333);
      expect(MESSAGE_MAX_LENGTH).toBe(1_333);
    });

    it("accepts an undefined message", () => {
      const issue = new IssueRecord();
      issue.setMessage(undefined);
      expect(issue.message).toBeUndefined();
    });
  });

  it("clears gap, severity and line when given undefined", () => {
    const issue = new IssueRecord();
    issue.setGap(undefined);
    issue.setSeverity(undefined);
    issue.setLine(undefined);

    expect(issue.gap).toBeUndefined();
    expect(issue.severity).toBeUndefined();
    expect(issue.line).toBeUndefined();
  });

  describe("line", () => {
    it("rejects zero", () => {
      const issue = new IssueRecord();
      expect(() => issue.setLine(0)).toThrow(exactly("Line must be null or greater than zero (got 0)"));
    });

    it("rejects the smallest 32-bit integer", () => {
      const issue = new IssueRecord();
      expect(() => issue.setLine(-2147483648)).toThrow(
        exactly("Line must be null or greater than zero (got -2147483648)"),
      );
    });

    it("rejects a fractional line and keeps the old one", () => {
      const issue = new IssueRecord();
      issue.setLine(10);
      expect(() => issue.setLine(1.5)).toThrow(exactly("Line must be null or greater than zero (got 1.5)"));
      expect(issue.line).toBe(10);
    });

    it("accepts a positive line", () => {
      const issue = new IssueRecord();
      issue.setLine(42);
      expect(issue.line).toBe(42);
    });
  });

  describe("gap", () => {
    it("rejects a negative gap", () => {
      const issue = new IssueRecord();
      expect(() => issue.setGap(-1)).toThrow(exactly("Gap must be greater than or equal 0 (got -1.0)"));
      expect(() => issue.setGap(-0.5)).toThrow(exactly("Gap must be greater than or equal 0 (got -0.5)"));
    });

    it("accepts zero", () => {
      const issue = new IssueRecord();
      issue.setGap(0);
      expect(issue.gap).toBe(0);
    });
  });

  describe("equality", () => {
    it("compares and hashes on the key only", () => {
      const a1 = issueWithKey("AAA");
      const a2 = issueWithKey("AAA");
      const b = issueWithKey("BBB");
      a2.setStatus("CLOSED");
      a2.setLine(7);

      expect(a1.equals(a1)).toBe(true);
      expect(a1.equals(a2)).toBe(true);
      expect(a1.equals(b)).toBe(false);
      expect(a1.hashCode()).toBe(a2.hashCode());
      expect(a1.hashCode()).toBe(64545);
    });

    it("is not equal to a value of another type", () => {
      expect(issueWithKey("AAA").equals("AAA")).toBe(false);
    });
  });

  describe("comments", () => {
    it("starts empty and refuses writes through the view", () => {
      const issue = issueWithKey("AAA");
      const comments = issue.comments;
      expect(comments).toEqual([]);

      const comment = createComment("AAA", "first", context);
      expect(() => Array.prototype.push.call(comments, comment)).toThrow(UnsupportedOperationError);
      expect(issue.comments).toHaveLength(0);
    });

    it("still accepts comments after a caller tries to freeze the view", () => {
      const issue = issueWithKey("AAA");

      expect(() => Object.freeze(issue.comments)).toThrow(UnsupportedOperationError);
      issue.addComment(createComment("AAA", "after freeze", context));
      expect(issue.comments).toHaveLength(1);
    });

    it("reflects comments added through the record", () => {
      const issue = issueWithKey("AAA");
      const view = issue.comments;
      const comment = createComment("AAA", "looks fine", context);
      issue.addComment(comment);

      expect(view).toHaveLength(1);
      expect(view[0]).toBe(comment);
    });
  });

  describe("changes", () => {
    it("stamps the diff record with the context's authorship", () => {
      const issue = issueWithKey("AAA");
      const webhookContext = withWebhook(context, "toto", "github");
      issue.setFieldChange(webhookContext, "actionPlan", "1.0", "1.1");

      expect(issue.changes).toHaveLength(1);
      const [diffs] = issue.changes;
      expect(diffs?.externalUser).toBe("toto");
      expect(diffs?.webhookSource).toBe("github");
      expect(diffs?.issueKey).toBe("AAA");
    });

    it("merges successive field changes into the current diff record", () => {
      const issue = issueWithKey("AAA");

      issue.setFieldChange(context, "actionPlan", "1.0", "1.1");
      expect(issue.changes).toHaveLength(1);
      const current = issue.currentChange;
      expect(current?.get("actionPlan")).toEqual({ oldValue: "1.0", newValue: "1.1" });
      expect(current?.get("authorLogin")).toBeUndefined();

      issue.setFieldChange(context, "authorLogin", undefined, "testuser");
      expect(issue.changes).toHaveLength(1);
      expect(current?.get("actionPlan")).toEqual({ oldValue: "1.0", newValue: "1.1" });
      expect(current?.get("authorLogin")?.newValue).toBe("testuser");
      expect(current?.get("authorLogin")?.oldValue).toBeUndefined();
    });

    it("ignores an undefined or null diff record", () => {
      const issue = new IssueRecord();
      issue.addChange(undefined);
      issue.addChange(null);

      expect(issue.changes).toHaveLength(0);
      expect(issue.currentChange).toBeUndefined();
    });

    it("appends a pre-built diff record verbatim", () => {
      const issue = new IssueRecord();
      const diffs = new FieldDiffs();
      diffs.setDiff("severity", "MINOR", "MAJOR");
      issue.addChange(diffs);

      expect(issue.changes).toHaveLength(1);
      expect(issue.currentChange).toBe(diffs);
    });

    it("opens a new diff record for a field change after a pre-built one", () => {
      const issue = issueWithKey("AAA");
      const imported = new FieldDiffs();
      imported.externalUser = "octocat";
      imported.webhookSource = "github";
      imported.setDiff("status", "OPEN", "ACCEPTED");
      issue.addChange(imported);

      issue.setFieldChange(context, "assignee", undefined, "user-2");

      expect(issue.changes).toHaveLength(2);
      expect(imported.externalUser).toBe("octocat");
      expect(imported.webhookSource).toBe("github");
      expect(imported.get("assignee")).toBeUndefined();
      expect(issue.currentChange?.get("assignee")).toEqual({ oldValue: undefined, newValue: "user-2" });
      expect(issue.currentChange?.userUuid).toBe("user-1");
    });

    it("refuses writes through the changes view", () => {
      const issue = new IssueRecord();
      expect(() => Array.prototype.push.call(issue.changes, new FieldDiffs())).toThrow(UnsupportedOperationError);
      expect(issue.changes).toHaveLength(0);
    });
  });

  describe("isToBeMigratedAsNewCodeReferenceIssue", () => {
    it.each([
      [true, false, false, true],
      [false, false, false, false],
      [true, true, false, false],
      [false, true, false, false],
      [true, false, true, false],
      [false, false, true, false],
      [true, true, true, false],
      [false, true, true, false],
    ])(
      "onChangedLine=%s newCodeReference=%s noLongerNewCodeReference=%s gives %s",
      (onChangedLine, newCodeReference, noLongerNewCodeReference, expected) => {
        const issue = issueWithKey("ABCD");
        issue.setIsOnChangedLine(onChangedLine);
        issue.setIsNewCodeReferenceIssue(newCodeReference);
        issue.setIsNoLongerNewCodeReferenceIssue(noLongerNewCodeReference);

        expect(issue.isToBeMigratedAsNewCodeReferenceIssue()).toBe(expected);
      },
    );
  });

  it("toggles the quick fix flag", () => {
    const issue = new IssueRecord();
    issue.setQuickFixAvailable(true);
    expect(issue.isQuickFixAvailable).toBe(true);
    issue.setQuickFixAvailable(false);
    expect(issue.isQuickFixAvailable).toBe(false);
  });

  it("has no characteristic", () => {
    expect(new IssueRecord().characteristic()).toBeUndefined();
  });

  describe("effort", () => {
    it("converts the effort to minutes", () => {
      const issue = new IssueRecord();
      issue.setEffort(Duration.create(60));
      expect(issue.effortInMinutes()).toBe(60);
    });

    it("returns undefined without an effort", () => {
      const issue = new IssueRecord();
      issue.setEffort(undefined);
      expect(issue.effortInMinutes()).toBeUndefined();
    });
  });

  describe("tags and code variants", () => {
    it("return empty sets on a fresh record", () => {
      const issue = new IssueRecord();
      expect(issue.tags.size).toBe(0);
      expect(issue.codeVariants.size).toBe(0);
    });

    it("copy the input collection", () => {
      const issue = new IssueRecord();
      const tags = ["security"];
      issue.setTags(tags);
      tags.push("performance");

      expect([...issue.tags]).toEqual(["security"]);
    });

    it("go back to empty when cleared", () => {
      const issue = new IssueRecord();
      issue.setCodeVariants(["linux", "windows"]);
      issue.setCodeVariants(undefined);
      expect(issue.codeVariants.size).toBe(0);
    });
  });

  describe("anticipated transition", () => {
    it("is absent by default", () => {
      expect(new IssueRecord().anticipatedTransitionUuid).toBeUndefined();
    });

    it("is present once set", () => {
      const issue = new IssueRecord();
      issue.setAnticipatedTransitionUuid("uuid");
      expect(issue.anticipatedTransitionUuid).toBe("uuid");
    });
  });
});
