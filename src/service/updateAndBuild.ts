import { join } from "node:path";
import { z } from "zod";
import type { RepairSettings } from "../config/repairConfig.js";
import type { FixOracle } from "../oracle/types.js";
import { setProperty } from "../patch/properties.js";
import { PROPERTIES_FILE } from "../patch/targets.js";
import { sessionLocks, type DirectoryLock } from "../repair/directoryLock.js";
import { executeRepairSession, lastAppliedFix, type RepairOutcome } from "../repair/session.js";
import type { RunImpl } from "../runner/runCmd.js";
import type { RepairEventHandler } from "../workflow/events.js";
import type { PatchReviewFn } from "../workflow/nodes.js";
import type { SourceFetcher } from "./sourceFetcher.js";

export const updateAndBuildRequestSchema = z.object({
  projectUrl: z.string().trim().min(1),
  dependencyName: z
    .string()
    .trim()
    .min(1)
    .regex(/^[^=:\s]+$/, "must not contain '=', ':' or whitespace"),
  dependencyValue: z.string().trim()
});

export type UpdateAndBuildRequest = z.infer<typeof updateAndBuildRequestSchema>;

export type UpdateAndBuildResponse = {
  status: "success" | "failed";
  attempts: number;
  finalBuildOutput: string;
  lastAppliedFix?: string;
  reason?: string;
  projectPath: string;
};

export const FINAL_OUTPUT_LIMIT = 4000;

export type UpdateAndBuildDeps = {
  fetcher: SourceFetcher;
  oracle: FixOracle;
  settings?: Partial<RepairSettings>;
  runImpl?: RunImpl;
  signal?: AbortSignal;
  onEvent?: RepairEventHandler;
  reviewPatch?: PatchReviewFn;
  auditDir?: string;
  lock?: DirectoryLock;
};

const boundOutput = (output: string): string =>
  output.length > FINAL_OUTPUT_LIMIT ? output.slice(output.length - FINAL_OUTPUT_LIMIT) : output;

const toResponse = (outcome: RepairOutcome): UpdateAndBuildResponse => ({
  status: outcome.status === "success" ? "success" : "failed",
  attempts: outcome.attempts.length,
  finalBuildOutput: boundOutput(outcome.lastBuild?.rawOutput ?? ""),
  lastAppliedFix: lastAppliedFix(outcome),
  reason: outcome.status === "success" ? undefined : (outcome.reason ?? outcome.status),
  projectPath: outcome.projectPath
});

/**
 * Fetches the project, pins `dependencyName=dependencyValue` in
 * gradle.properties and runs a repair session, all under the directory lock.
 */
export const updateAndBuild = async (
  request: UpdateAndBuildRequest,
  deps: UpdateAndBuildDeps
): Promise<UpdateAndBuildResponse> => {
  const input = updateAndBuildRequestSchema.parse(request);

  return (deps.lock ?? sessionLocks).run(deps.fetcher.projectPathFor(input.projectUrl), async () => {
    const projectPath = await deps.fetcher.ensureProject(input.projectUrl, { signal: deps.signal });
    await setProperty(join(projectPath, PROPERTIES_FILE), input.dependencyName, input.dependencyValue);
    const outcome = await executeRepairSession({
      projectPath,
      oracle: deps.oracle,
      settings: deps.settings,
      runImpl: deps.runImpl,
      signal: deps.signal,
      onEvent: deps.onEvent,
      reviewPatch: deps.reviewPatch,
      auditDir: deps.auditDir
    });
    return toResponse(outcome);
  });
};
