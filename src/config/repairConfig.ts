import { z } from "zod";
import { ConfigError } from "../runtime/errors.js";

const flag = z
  .enum(["1", "0", "true", "false", "yes", "no", "on", "off"])
  .transform((value) => value === "1" || value === "true" || value === "yes" || value === "on");

const envSchema = z.object({
  REPAIR_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(3),
  REPAIR_BUILD_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
  REPAIR_BUILD_ARGS: z
    .string()
    .trim()
    .min(1)
    .transform((value) => value.split(/\s+/))
    .default("build --stacktrace"),
  REPAIR_ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  REPAIR_EXCERPT_BUDGET: z.coerce.number().int().positive().default(1500),
  REPAIR_TAIL_LINES: z.coerce.number().int().positive().default(50),
  REPAIR_CONTEXT_CHARS: z.coerce.number().int().positive().default(12_000),
  REPAIR_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  REPAIR_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(2048),
  REPAIR_FAIL_ON_PERSISTENT_TIMEOUT: flag.default("true"),
  REPAIR_WORKSPACE_DIR: z.string().min(1).default("./workspace"),
  REPAIR_AUDIT_DIR: z.string().min(1).optional()
});

export type RepairSettings = {
  maxAttempts: number;
  buildTimeoutMs: number;
  buildArgs: string[];
  oracleTimeoutMs: number;
  excerptBudget: number;
  tailLines: number;
  failOnPersistentTimeout: boolean;
};

export type OracleSettings = {
  temperature: number;
  maxOutputTokens: number;
  maxFileChars: number;
};

export type RepairConfig = {
  repair: RepairSettings;
  oracle: OracleSettings;
  workspaceDir: string;
  auditDir?: string;
};

export const DEFAULT_REPAIR_SETTINGS: RepairSettings = {
  maxAttempts: 3,
  buildTimeoutMs: 600_000,
  buildArgs: ["build", "--stacktrace"],
  oracleTimeoutMs: 120_000,
  excerptBudget: 1500,
  tailLines: 50,
  failOnPersistentTimeout: true
};

export const DEFAULT_ORACLE_SETTINGS: OracleSettings = {
  temperature: 0.2,
  maxOutputTokens: 2048,
  maxFileChars: 12_000
};

const blankToUndefined = (env: NodeJS.ProcessEnv): Record<string, string | undefined> =>
  Object.fromEntries(
    Object.entries(env)
      .filter(([key]) => key.startsWith("REPAIR_"))
      .map(([key, value]) => [key, value === undefined || value.trim().length === 0 ? undefined : value.trim()])
  );

export const loadRepairConfig = (env: NodeJS.ProcessEnv = process.env): RepairConfig => {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const lines = parsed.error.issues.map((issue) => `- ${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigError(`Invalid repair configuration:\n${lines.join("\n")}`);
  }

  const value = parsed.data;
  return {
    repair: {
      maxAttempts: value.REPAIR_MAX_ATTEMPTS,
      buildTimeoutMs: value.REPAIR_BUILD_TIMEOUT_MS,
      buildArgs: value.REPAIR_BUILD_ARGS,
      oracleTimeoutMs: value.REPAIR_ORACLE_TIMEOUT_MS,
      excerptBudget: value.REPAIR_EXCERPT_BUDGET,
      tailLines: value.REPAIR_TAIL_LINES,
      failOnPersistentTimeout: value.REPAIR_FAIL_ON_PERSISTENT_TIMEOUT
    },
    oracle: {
      temperature: value.REPAIR_TEMPERATURE,
      maxOutputTokens: value.REPAIR_MAX_OUTPUT_TOKENS,
      maxFileChars: value.REPAIR_CONTEXT_CHARS
    },
    workspaceDir: value.REPAIR_WORKSPACE_DIR,
    auditDir: value.REPAIR_AUDIT_DIR
  };
};
