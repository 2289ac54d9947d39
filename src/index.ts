export { runBuild, resolveBuildEntry } from "./build/buildRunner.js";
export { extractDiagnostic, DEFAULT_DIAGNOSTIC_PATTERNS } from "./build/extractDiagnostic.js";
export type { DiagnosticPattern } from "./build/extractDiagnostic.js";
export type { BuildEntry, BuildResult, DiagnosticExcerpt } from "./build/types.js";
export { loadRepairConfig, DEFAULT_ORACLE_SETTINGS, DEFAULT_REPAIR_SETTINGS } from "./config/repairConfig.js";
export type { OracleSettings, RepairConfig, RepairSettings } from "./config/repairConfig.js";
export { getProviderFromEnv } from "./llm/index.js";
export type { LlmCallOptions, LlmMessage, LlmProvider, LlmResponse } from "./llm/index.js";
export { LlmFixOracle } from "./oracle/llmOracle.js";
export { parseFixProposal } from "./oracle/parseProposal.js";
export { NO_FIX_SENTINEL } from "./oracle/prompts.js";
export { proposeWithTimeout } from "./oracle/timeout.js";
export { isActionable } from "./oracle/types.js";
export type { ActionableProposal, ConfigFileId, FixOracle, FixProposal, OracleRequest } from "./oracle/types.js";
export { applyProposal, FIX_MARKER } from "./patch/applyProposal.js";
export type { PatchOutcome } from "./patch/applyProposal.js";
export { parseProperties, setProperty, setPropertyInText } from "./patch/properties.js";
export { DirectoryLock, sessionLocks } from "./repair/directoryLock.js";
export { assertRepaired, executeRepairSession, lastAppliedFix, runRepairSession } from "./repair/session.js";
export type { RepairOutcome, RepairSessionOptions } from "./repair/session.js";
export { runCmd } from "./runner/runCmd.js";
export type { CmdResult, RunCmdOptions, RunImpl } from "./runner/runCmd.js";
export {
  BuildInvocationError,
  ConfigError,
  ConfigReadError,
  OracleTimeoutError,
  OracleUnparsableError,
  PatchWriteError,
  SessionExhaustedError,
  SourceFetchError
} from "./runtime/errors.js";
export { GitSourceFetcher, LocalSourceFetcher } from "./service/sourceFetcher.js";
export type { SourceFetcher } from "./service/sourceFetcher.js";
export { updateAndBuild, updateAndBuildRequestSchema } from "./service/updateAndBuild.js";
export type { UpdateAndBuildRequest, UpdateAndBuildResponse } from "./service/updateAndBuild.js";
export type { RepairEvent, RepairEventHandler } from "./workflow/events.js";
export type { PatchReviewFn } from "./workflow/nodes.js";
export type { AttemptRecord, FailureReason, RepairOutcomeStatus } from "./workflow/state.js";
