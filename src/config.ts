import { z } from "zod";
import { InvalidArgumentError } from "./errors.js";

export const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const configSchema = z.object({
  ISSUE_LEDGER_LOG_LEVEL: logLevelSchema.default("info"),
});

export interface IssueLedgerConfig {
  logLevel: z.infer<typeof logLevelSchema>;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): IssueLedgerConfig {
  const parsed = configSchema.safeParse({
    ISSUE_LEDGER_LOG_LEVEL: env.ISSUE_LEDGER_LOG_LEVEL?.trim().toLowerCase() || undefined,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join(".") ?? "environment";
    throw new InvalidArgumentError(`Invalid configuration for ${variable}: ${issue?.message ?? "unknown error"}`, {
      variable,
    });
  }

  return { logLevel: parsed.data.ISSUE_LEDGER_LOG_LEVEL };
}
