import { resolve } from "node:path";
import type { BuildResult } from "../build/types.js";
import { DEFAULT_REPAIR_SETTINGS, type RepairSettings } from "../config/repairConfig.js";
import type { FixOracle } from "../oracle/types.js";
import type { RunImpl } from "../runner/runCmd.js";
import { AuditCollector } from "../runtime/audit.js";
import { OracleUnparsableError, SessionExhaustedError } from "../runtime/errors.js";
import type { RepairEventHandler } from "../workflow/events.js";
import { invokeRepairGraph } from "../workflow/graph.js";
import type { PatchReviewFn } from "../workflow/nodes.js";
import {
  createInitialState,
  type AttemptRecord,
  type FailureReason,
  type RepairOutcomeStatus
} from "../workflow/state.js";
import { sessionLocks, type DirectoryLock } from "./directoryLock.js";

export type RepairSessionOptions = {
  projectPath: string;
  oracle: FixOracle;
  settings?: Partial<RepairSettings>;
  runImpl?: RunImpl;
  signal?: AbortSignal;
  onEvent?: RepairEventHandler;
  reviewPatch?: PatchReviewFn;
  auditDir?: string;
  lock?: DirectoryLock;
};

export type RepairOutcome = {
  status: RepairOutcomeStatus;
  reason?: FailureReason;
  message?: string;
  projectPath: string;
  maxAttempts: number;
  builds: number;
  attempts: AttemptRecord[];
  lastBuild: BuildResult | null;
  auditPath?: string;
};

const resolveSettings = (overrides: Partial<RepairSettings> = {}): RepairSettings => {
  const settings = { ...DEFAULT_REPAIR_SETTINGS, ...overrides };
  if (!Number.isInteger(settings.maxAttempts) || settings.maxAttempts < 1) {
    throw new Error(`maxAttempts must be a positive integer, got ${settings.maxAttempts}`);
  }
  return settings;
};

/** Runs one session without taking the directory lock; the caller must hold it. */
export const executeRepairSession = async (options: RepairSessionOptions): Promise<RepairOutcome> => {
  const settings = resolveSettings(options.settings);
  const projectPath = resolve(options.projectPath);
  const audit = new AuditCollector(projectPath);

  options.onEvent?.({ type: "session_start", projectPath, maxAttempts: settings.maxAttempts });
  audit.record("session", { projectPath, oracle: options.oracle.name, settings });

  const final = await invokeRepairGraph(
    {
      oracle: options.oracle,
      settings,
      audit,
      runImpl: options.runImpl,
      signal: options.signal,
      onEvent: options.onEvent,
      reviewPatch: options.reviewPatch
    },
    createInitialState({ projectPath, maxAttempts: settings.maxAttempts })
  );

  const terminal = final.terminal;
  if (!terminal) {
    throw new Error("repair graph ended without a terminal state");
  }

  const outcome: RepairOutcome = {
    status: terminal.kind,
    reason: terminal.kind === "failed" ? terminal.reason : undefined,
    message: terminal.kind === "success" ? undefined : terminal.message,
    projectPath,
    maxAttempts: settings.maxAttempts,
    builds: final.builds,
    attempts: final.attempts,
    lastBuild: final.lastBuild
  };

  audit.record("session", { status: outcome.status, reason: outcome.reason, attempts: outcome.attempts.length });
  if (options.auditDir) {
    outcome.auditPath = await audit.flush(options.auditDir);
  }

  options.onEvent?.({
    type: "done",
    status: outcome.status,
    reason: outcome.reason,
    message: outcome.message,
    attempts: outcome.attempts.length
  });
  return outcome;
};

export const runRepairSession = async (options: RepairSessionOptions): Promise<RepairOutcome> =>
  (options.lock ?? sessionLocks).run(options.projectPath, () => executeRepairSession(options));

export const assertRepaired = (outcome: RepairOutcome): void => {
  if (outcome.status === "success") return;
  if (outcome.status === "max_attempts_exhausted") {
    throw new SessionExhaustedError(outcome.attempts.length);
  }
  if (outcome.reason === "unparsable") {
    throw new OracleUnparsableError(outcome.message ?? "unparsable oracle response");
  }
  throw new Error(outcome.message ?? `repair failed: ${outcome.reason ?? "unknown"}`);
};

export const lastAppliedFix = (outcome: RepairOutcome): string | undefined =>
  [...outcome.attempts].reverse().find((attempt) => attempt.applied)?.proposal.content;
