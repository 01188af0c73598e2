import { z } from "zod";

export const issueTypeSchema = z.enum(["CODE_SMELL", "BUG", "VULNERABILITY", "SECURITY_HOTSPOT"]);

export type IssueType = z.infer<typeof issueTypeSchema>;
