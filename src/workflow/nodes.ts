import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { runBuild } from "../build/buildRunner.js";
import { extractDiagnostic } from "../build/extractDiagnostic.js";
import type { BuildResult } from "../build/types.js";
import type { RepairSettings } from "../config/repairConfig.js";
import { parseFixProposal } from "../oracle/parseProposal.js";
import { proposeWithTimeout } from "../oracle/timeout.js";
import {
  isActionable,
  type ActionableProposal,
  type ConfigFileSnapshot,
  type FixOracle,
  type FixProposal,
  type OracleRequest
} from "../oracle/types.js";
import { applyProposal } from "../patch/applyProposal.js";
import { PROPERTIES_FILE, resolveBuildScriptName, resolveTargetPath } from "../patch/targets.js";
import type { RunImpl } from "../runner/runCmd.js";
import type { AuditCollector } from "../runtime/audit.js";
import { ConfigReadError, OracleTimeoutError, errorMessage } from "../runtime/errors.js";
import type { RepairEventHandler } from "./events.js";
import { terminate, type AttemptRecord, type RepairState } from "./state.js";

export type PatchReviewFn = (args: {
  proposal: ActionableProposal;
  attempt: number;
  projectPath: string;
}) => Promise<boolean>;

export type RepairDeps = {
  oracle: FixOracle;
  settings: RepairSettings;
  audit: AuditCollector;
  runImpl?: RunImpl;
  signal?: AbortSignal;
  onEvent?: RepairEventHandler;
  reviewPatch?: PatchReviewFn;
};

type NodeUpdate = Partial<RepairState>;

const appendAudit = (state: RepairState, node: string, ok: boolean, note?: string): RepairState["audit"] => [
  ...state.audit,
  { node, ok, note }
];

const tail = (value: string, max = 4000): string => (value.length > max ? value.slice(value.length - max) : value);

/** A missing file reads as empty; any other failure is a `ConfigReadError`. */
const readOrEmpty = async (path: string): Promise<string> => {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return "";
    }
    throw new ConfigReadError(path, error);
  }
};

const readConfigFiles = async (projectRoot: string): Promise<OracleRequest["files"]> => {
  const buildScriptName = await resolveBuildScriptName(projectRoot);
  const properties: ConfigFileSnapshot = {
    fileName: PROPERTIES_FILE,
    content: await readOrEmpty(join(projectRoot, PROPERTIES_FILE))
  };
  const buildScript: ConfigFileSnapshot = {
    fileName: buildScriptName,
    content: await readOrEmpty(join(projectRoot, buildScriptName))
  };
  return { properties, build_script: buildScript };
};

const requireLastBuild = (state: RepairState): BuildResult => {
  if (!state.lastBuild) {
    throw new Error("repair graph reached the oracle without a build result");
  }
  return state.lastBuild;
};

const withAttempt = (
  state: RepairState,
  proposal: FixProposal,
  applied: boolean,
  note?: string
): AttemptRecord[] => [
  ...state.attempts,
  {
    index: state.attempts.length + 1,
    buildResult: requireLastBuild(state),
    diagnostic: state.diagnostic?.text ?? "",
    proposal,
    applied,
    note
  }
];

export const createRepairNodes = (deps: RepairDeps) => {
  const emit: RepairEventHandler = (event) => deps.onEvent?.(event);
  const aborted = (state: RepairState, node: string, extra: NodeUpdate = {}): NodeUpdate => ({
    ...extra,
    ...terminate(state, { kind: "failed", reason: "aborted", message: "repair session aborted" }),
    audit: appendAudit(state, node, false, "aborted")
  });

  const runBuildNode = async (state: RepairState): Promise<NodeUpdate> => {
    if (deps.signal?.aborted) return aborted(state, "run_build");

    const build = state.builds + 1;
    emit({ type: "build_start", build, attempt: state.attempts.length });

    let result: BuildResult;
    try {
      result = await runBuild(state.projectPath, {
        args: deps.settings.buildArgs,
        timeoutMs: deps.settings.buildTimeoutMs,
        signal: deps.signal,
        runImpl: deps.runImpl
      });
    } catch (error) {
      const message = errorMessage(error, "build invocation failed");
      deps.audit.record("run", { build, error: message });
      return {
        builds: build,
        ...terminate(state, { kind: "failed", reason: "build-invocation", message }),
        audit: appendAudit(state, "run_build", false, message)
      };
    }

    deps.audit.record("run", {
      build,
      success: result.success,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
      durationMs: result.durationMs,
      outputTail: tail(result.rawOutput)
    });
    emit({ type: "build_end", build, ok: result.success, timedOut: result.timedOut, durationMs: result.durationMs });

    const timedOutBuilds = state.timedOutBuilds + (result.timedOut ? 1 : 0);
    const base: NodeUpdate = { builds: build, timedOutBuilds, lastBuild: result };

    if (deps.signal?.aborted) return aborted(state, "run_build", base);

    if (result.success) {
      return {
        ...base,
        ...terminate(state, { kind: "success" }),
        audit: appendAudit(state, "run_build", true, `build ${build} succeeded`)
      };
    }

    if (deps.settings.failOnPersistentTimeout && build >= 2 && timedOutBuilds === build) {
      const message = `every build timed out (${build} of ${build})`;
      return {
        ...base,
        ...terminate(state, { kind: "failed", reason: "build-timeout", message }),
        audit: appendAudit(state, "run_build", false, message)
      };
    }

    if (state.attempts.length >= state.maxAttempts) {
      const message = `build still failing after ${state.attempts.length} repair attempts`;
      return {
        ...base,
        ...terminate(state, { kind: "max_attempts_exhausted", message }),
        audit: appendAudit(state, "run_build", false, message)
      };
    }

    const diagnostic = extractDiagnostic(result.rawOutput, {
      budget: deps.settings.excerptBudget,
      tailLines: deps.settings.tailLines
    });
    emit({ type: "diagnostic", text: diagnostic.text, patterns: diagnostic.matchedPatterns, fallback: diagnostic.fallback });

    return {
      ...base,
      diagnostic,
      proposal: null,
      phase: "awaiting_oracle",
      audit: appendAudit(state, "run_build", false, result.timedOut ? `build ${build} timed out` : `build ${build} failed`)
    };
  };

  const consultOracleNode = async (state: RepairState): Promise<NodeUpdate> => {
    const attempt = state.attempts.length + 1;
    let files: OracleRequest["files"];
    try {
      files = await readConfigFiles(state.projectPath);
    } catch (error) {
      if (!(error instanceof ConfigReadError)) throw error;
      return {
        ...terminate(state, { kind: "failed", reason: "config-read", message: error.message }),
        audit: appendAudit(state, "consult_oracle", false, error.message)
      };
    }
    const request: OracleRequest = {
      diagnostic: state.diagnostic?.text ?? "",
      files,
      attempt,
      maxAttempts: state.maxAttempts
    };
    emit({ type: "oracle_start", attempt, oracle: deps.oracle.name });

    let raw: string;
    try {
      raw = await proposeWithTimeout(deps.oracle, request, {
        timeoutMs: deps.settings.oracleTimeoutMs,
        signal: deps.signal
      });
    } catch (error) {
      if (deps.signal?.aborted) return aborted(state, "consult_oracle");
      const reason = error instanceof OracleTimeoutError ? "oracle-timeout" : "oracle-error";
      const message = errorMessage(error, "oracle call failed");
      deps.audit.record("llm_call", { attempt, error: message });
      return {
        ...terminate(state, { kind: "failed", reason, message }),
        audit: appendAudit(state, "consult_oracle", false, message)
      };
    }

    const proposal = parseFixProposal(raw);
    deps.audit.record("llm_call", { attempt, raw, action: proposal.action });
    emit({ type: "proposal", attempt, proposal });

    switch (proposal.action) {
      case "no_fix":
        return {
          proposal,
          attempts: withAttempt(state, proposal, false, "oracle reported no fix"),
          ...terminate(state, { kind: "failed", reason: "no-fix", message: "oracle could not provide a fix" }),
          audit: appendAudit(state, "consult_oracle", false, "no fix")
        };
      case "invalid": {
        const message = `unparsable oracle response: ${proposal.reason}`;
        return {
          proposal,
          attempts: withAttempt(state, proposal, false, proposal.reason),
          ...terminate(state, { kind: "failed", reason: "unparsable", message }),
          audit: appendAudit(state, "consult_oracle", false, message)
        };
      }
      case "append":
      case "replace_match":
        return {
          proposal,
          phase: "applying",
          audit: appendAudit(state, "consult_oracle", true, `${proposal.action} ${proposal.targetFile}`)
        };
      default: {
        const unreachable: never = proposal;
        throw new Error(`Unhandled proposal: ${JSON.stringify(unreachable)}`);
      }
    }
  };

  const applyPatchNode = async (state: RepairState): Promise<NodeUpdate> => {
    const proposal = state.proposal;
    if (!proposal || !isActionable(proposal)) {
      throw new Error("apply_patch reached without an actionable proposal");
    }
    const attempt = state.attempts.length + 1;

    if (deps.reviewPatch) {
      const approved = await deps.reviewPatch({ proposal, attempt, projectPath: state.projectPath });
      if (!approved) {
        return {
          attempts: withAttempt(state, proposal, false, "declined by reviewer"),
          ...terminate(state, { kind: "failed", reason: "patch-declined", message: "proposed patch was declined" }),
          audit: appendAudit(state, "apply_patch", false, "declined")
        };
      }
    }

    try {
      const filePath = await resolveTargetPath(state.projectPath, proposal.targetFile);
      const outcome = await applyProposal(proposal, filePath, { signal: deps.signal });
      deps.audit.record("apply", { attempt, ...outcome });
      emit({ type: "patch_applied", attempt, filePath, applied: outcome.applied, note: outcome.note });

      return {
        attempts: withAttempt(state, proposal, outcome.applied, outcome.note),
        phase: "running",
        audit: appendAudit(state, "apply_patch", outcome.applied, outcome.note)
      };
    } catch (error) {
      const update: NodeUpdate = { attempts: withAttempt(state, proposal, false, errorMessage(error)) };
      if (deps.signal?.aborted) return aborted(state, "apply_patch", update);
      const message = errorMessage(error, "patch application failed");
      deps.audit.record("apply", { attempt, error: message });
      return {
        ...update,
        ...terminate(state, { kind: "failed", reason: "apply-failed", message }),
        audit: appendAudit(state, "apply_patch", false, message)
      };
    }
  };

  return {
    run_build: runBuildNode,
    consult_oracle: consultOracleNode,
    apply_patch: applyPatchNode
  };
};
