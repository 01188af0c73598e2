import { describe, expect, it } from "vitest";
import { IssueRecord } from "../src/issue/issueRecord.js";
import { parseIssueSnapshot } from "../src/schema/issueSnapshot.js";
import { Duration } from "../src/schema/duration.js";
import { InvalidArgumentError } from "../src/errors.js";
import { exactly } from "./helpers.js";

function sampleIssue(): IssueRecord {
  const issue = new IssueRecord();
  issue.setKey("AX-42");
  issue.setType("BUG");
  issue.setRuleKey("ts:S1481");
  issue.setStatus("OPEN");
  issue.setSeverity("MAJOR");
  issue.setMessage("Remove the unused local variable");
  issue.setLine(17);
  issue.setGap(1.5);
  issue.setEffort(Duration.create(5));
  issue.setCreationDate(new Date("2024-02-10T08:30:00.000Z"));
  issue.setTags(["unused", "clumsy"]);
  issue.setIsOnChangedLine(true);
  return issue;
}

describe("issue snapshots", () => {
  it("freezes the snapshot and its collections", () => {
    const snapshot = sampleIssue().toSnapshot();

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.tags)).toBe(true);
    expect(snapshot.effortMinutes).toBe(5);
    expect(snapshot.tags).toEqual(["unused", "clumsy"]);
    expect(snapshot.codeVariants).toEqual([]);
  });

  it("does not follow later changes to the record", () => {
    const issue = sampleIssue();
    const snapshot = issue.toSnapshot();
    issue.setStatus("CLOSED");

    expect(snapshot.status).toBe("OPEN");
  });

  it("rebuilds an equal record from a snapshot", () => {
    const original = sampleIssue();
    const rebuilt = IssueRecord.fromSnapshot(original.toSnapshot());

    expect(rebuilt.equals(original)).toBe(true);
    expect(rebuilt.toSnapshot()).toEqual(original.toSnapshot());
    expect(rebuilt.changes).toHaveLength(0);
  });

  it("parses stored data with ISO dates and defaults", () => {
    const snapshot = parseIssueSnapshot({
      key: "AX-43",
      creationDate: "2024-05-01T10:00:00.000Z",
      tags: ["b", "a"],
    });

    expect(snapshot.creationDate).toEqual(new Date("2024-05-01T10:00:00.000Z"));
    expect(snapshot.isNew).toBe(false);
    expect(snapshot.codeVariants).toEqual([]);

    const issue = IssueRecord.fromSnapshot(snapshot);
    expect(issue.key).toBe("AX-43");
    expect([...issue.tags]).toEqual(["b", "a"]);
  });

  it("rejects data of the wrong shape", () => {
    expect(() => parseIssueSnapshot({ line: "3" })).toThrow(InvalidArgumentError);
    expect(() => parseIssueSnapshot({ line: "3" })).toThrow(
      exactly("Invalid issue snapshot at line: Expected number, received string"),
    );
  });

  it("applies the record's own checks when rebuilding", () => {
    const snapshot = parseIssueSnapshot({ key: "AX-44", line: 0 });

    expect(() => IssueRecord.fromSnapshot(snapshot)).toThrow(
      exactly("Line must be null or greater than zero (got 0)"),
    );
  });
});
