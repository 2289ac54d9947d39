import { Annotation } from "@langchain/langgraph";
import type { BuildResult, DiagnosticExcerpt } from "../build/types.js";
import type { FixProposal } from "../oracle/types.js";

export type RepairPhase =
  | "init"
  | "running"
  | "awaiting_oracle"
  | "applying"
  | "success"
  | "failed"
  | "max_attempts_exhausted";

export type FailureReason =
  | "no-fix"
  | "unparsable"
  | "config-read"
  | "apply-failed"
  | "build-invocation"
  | "build-timeout"
  | "oracle-timeout"
  | "oracle-error"
  | "patch-declined"
  | "aborted";

export type TerminalState =
  | { kind: "success" }
  | { kind: "failed"; reason: FailureReason; message: string }
  | { kind: "max_attempts_exhausted"; message: string };

export type RepairOutcomeStatus = TerminalState["kind"];

export type AttemptRecord = {
  index: number;
  buildResult: BuildResult;
  diagnostic: string;
  proposal: FixProposal;
  applied: boolean;
  note?: string;
};

export type AuditItem = {
  node: string;
  ok: boolean;
  note?: string;
};

export const RepairStateAnnotation = Annotation.Root({
  projectPath: Annotation<string>,
  maxAttempts: Annotation<number>,
  phase: Annotation<RepairPhase>,
  builds: Annotation<number>,
  timedOutBuilds: Annotation<number>,
  attempts: Annotation<AttemptRecord[]>,
  lastBuild: Annotation<BuildResult | null>,
  diagnostic: Annotation<DiagnosticExcerpt | null>,
  proposal: Annotation<FixProposal | null>,
  terminal: Annotation<TerminalState | null>,
  audit: Annotation<AuditItem[]>
});

export type RepairState = typeof RepairStateAnnotation.State;

export const createInitialState = (args: { projectPath: string; maxAttempts: number }): RepairState => ({
  projectPath: args.projectPath,
  maxAttempts: args.maxAttempts,
  phase: "init",
  builds: 0,
  timedOutBuilds: 0,
  attempts: [],
  lastBuild: null,
  diagnostic: null,
  proposal: null,
  terminal: null,
  audit: []
});

const phaseFor = (terminal: TerminalState): RepairPhase => terminal.kind;

/** The terminal state is written once; a second write is a bug in a node. */
export const terminate = (state: RepairState, terminal: TerminalState): Pick<RepairState, "terminal" | "phase"> => {
  if (state.terminal) {
    throw new Error(`terminal state already set to ${state.terminal.kind}`);
  }
  return { terminal, phase: phaseFor(terminal) };
};
