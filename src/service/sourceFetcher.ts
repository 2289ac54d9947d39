import { mkdir, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { runCmd, type CmdResult, type RunImpl } from "../runner/runCmd.js";
import { SourceFetchError } from "../runtime/errors.js";
import { assertCommandAllowed, assertCwdInside, assertPathInside } from "../runtime/policy.js";

export interface SourceFetcher {
  /** Where `ensureProject` will place the project; used as the lock key before fetching. */
  projectPathFor(locator: string): string;
  /** Idempotent: returns a directory holding the project, creating or refreshing it as needed. */
  ensureProject(locator: string, opts?: { signal?: AbortSignal }): Promise<string>;
}

const isDirectory = async (path: string): Promise<boolean> => {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
};

export const projectNameFromUrl = (url: string): string => {
  const last = url.trim().replace(/[\\/]+$/, "").split(/[\\/:]/).pop() ?? "";
  const name = last.replace(/\.git$/, "").replace(/[^A-Za-z0-9._-]/g, "_");
  if (name.length === 0 || name === "." || name === "..") {
    throw new SourceFetchError(`Cannot derive a project name from ${url}`);
  }
  return name;
};

const GIT_TIMEOUT_MS = 300_000;

export class GitSourceFetcher implements SourceFetcher {
  private readonly workspaceDir: string;
  private readonly run: RunImpl;

  constructor(workspaceDir: string, runImpl: RunImpl = runCmd) {
    this.workspaceDir = resolve(workspaceDir);
    this.run = runImpl;
  }

  private async git(args: string[], cwd: string, signal?: AbortSignal): Promise<CmdResult> {
    assertCommandAllowed("git");
    assertCwdInside(this.workspaceDir, cwd);
    const result = await this.run("git", args, cwd, { timeoutMs: GIT_TIMEOUT_MS, signal });
    if (!result.ok) {
      throw new SourceFetchError(`git ${args[0]} failed (code ${result.code}): ${result.stderr.trim()}`);
    }
    return result;
  }

  projectPathFor(locator: string): string {
    const projectPath = join(this.workspaceDir, projectNameFromUrl(locator));
    assertPathInside(this.workspaceDir, projectPath);
    return projectPath;
  }

  async ensureProject(locator: string, opts: { signal?: AbortSignal } = {}): Promise<string> {
    const projectPath = this.projectPathFor(locator);

    if (await isDirectory(join(projectPath, ".git"))) {
      // discard edits left by earlier sessions
      await this.git(["fetch", "--depth", "1", locator], projectPath, opts.signal);
      await this.git(["reset", "--hard", "FETCH_HEAD"], projectPath, opts.signal);
      await this.git(["clean", "-fd"], projectPath, opts.signal);
      return projectPath;
    }

    await mkdir(this.workspaceDir, { recursive: true });
    await this.git(["clone", "--depth", "1", locator, projectPath], this.workspaceDir, opts.signal);
    return projectPath;
  }
}

export class LocalSourceFetcher implements SourceFetcher {
  projectPathFor(locator: string): string {
    return resolve(locator);
  }

  async ensureProject(locator: string): Promise<string> {
    const projectPath = this.projectPathFor(locator);
    if (!(await isDirectory(projectPath))) {
      throw new SourceFetchError(`Project directory not found: ${projectPath}`);
    }
    return projectPath;
  }
}
