import { randomUUID } from "node:crypto";
import type { ChangeContext } from "./changeContext.js";

export interface IssueComment {
  key: string;
  issueKey?: string;
  userUuid?: string;
  markdownText: string;
  createdAt: Date;
  updatedAt: Date;
}

export function createComment(
  issueKey: string | undefined,
  markdownText: string,
  context: ChangeContext,
): IssueComment {
  return {
    key: randomUUID(),
    issueKey,
    userUuid: context.userUuid,
    markdownText,
    createdAt: context.date,
    updatedAt: context.date,
  };
}
