import { constants } from "node:fs";
import { access } from "node:fs/promises";
import { delimiter, join, resolve } from "node:path";
import { runCmd, type RunImpl } from "../runner/runCmd.js";
import { BuildInvocationError } from "../runtime/errors.js";
import { assertCommandAllowed } from "../runtime/policy.js";
import type { BuildEntry, BuildResult } from "./types.js";

export const DEFAULT_BUILD_ARGS = ["build", "--stacktrace"];
export const DEFAULT_BUILD_TIMEOUT_MS = 600_000;

const exists = async (path: string, mode = constants.F_OK): Promise<boolean> => {
  try {
    await access(path, mode);
    return true;
  } catch {
    return false;
  }
};

const findOnPath = async (names: string[], pathEnv: string): Promise<string | undefined> => {
  for (const dir of pathEnv.split(delimiter)) {
    if (dir.length === 0) continue;
    for (const name of names) {
      const candidate = join(dir, name);
      if (await exists(candidate, constants.X_OK)) {
        return candidate;
      }
    }
  }
  return undefined;
};

export const resolveBuildEntry = async (
  projectRoot: string,
  opts: { args?: string[]; pathEnv?: string; platform?: NodeJS.Platform } = {}
): Promise<BuildEntry> => {
  const args = opts.args ?? DEFAULT_BUILD_ARGS;
  const windows = (opts.platform ?? process.platform) === "win32";
  const root = resolve(projectRoot);

  const wrapper = join(root, windows ? "gradlew.bat" : "gradlew");
  if (await exists(wrapper)) {
    if (windows || (await exists(wrapper, constants.X_OK))) {
      return { command: wrapper, args, source: "wrapper" };
    }
    // wrapper checked out without the executable bit
    return { command: "sh", args: [wrapper, ...args], source: "wrapper" };
  }

  const global = await findOnPath(windows ? ["gradle.bat", "gradle"] : ["gradle"], opts.pathEnv ?? process.env.PATH ?? "");
  if (global) {
    return { command: global, args, source: "global" };
  }

  throw new BuildInvocationError(
    `No Gradle wrapper in ${root} and no gradle executable on PATH. Add gradlew to the project or install Gradle.`
  );
};

export const runBuild = async (
  projectRoot: string,
  opts: {
    args?: string[];
    timeoutMs?: number;
    signal?: AbortSignal;
    runImpl?: RunImpl;
    entry?: BuildEntry;
  } = {}
): Promise<BuildResult> => {
  const run = opts.runImpl ?? runCmd;
  const entry = opts.entry ?? (await resolveBuildEntry(projectRoot, { args: opts.args }));
  assertCommandAllowed(entry.command);

  const startedAt = Date.now();
  const result = await run(entry.command, entry.args, projectRoot, {
    timeoutMs: opts.timeoutMs ?? DEFAULT_BUILD_TIMEOUT_MS,
    signal: opts.signal
  });

  if (result.spawnError) {
    throw new BuildInvocationError(`Could not start ${entry.command}: ${result.spawnError.message}`);
  }

  return {
    success: result.ok,
    rawOutput: result.output,
    exitCode: result.code,
    timedOut: result.timedOut,
    durationMs: Date.now() - startedAt
  };
};
