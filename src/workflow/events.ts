import type { FixProposal } from "../oracle/types.js";
import type { FailureReason, RepairOutcomeStatus } from "./state.js";

export type RepairEvent =
  | { type: "session_start"; projectPath: string; maxAttempts: number }
  | { type: "build_start"; build: number; attempt: number }
  | { type: "build_end"; build: number; ok: boolean; timedOut: boolean; durationMs: number }
  | { type: "diagnostic"; text: string; patterns: string[]; fallback: boolean }
  | { type: "oracle_start"; attempt: number; oracle: string }
  | { type: "proposal"; attempt: number; proposal: FixProposal }
  | { type: "patch_applied"; attempt: number; filePath: string; applied: boolean; note?: string }
  | { type: "done"; status: RepairOutcomeStatus; reason?: FailureReason; message?: string; attempts: number };

export type RepairEventHandler = (event: RepairEvent) => void;
