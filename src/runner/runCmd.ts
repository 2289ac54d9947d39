import { spawn } from "node:child_process";

export type CmdResult = {
  ok: boolean;
  code: number;
  stdout: string;
  stderr: string;
  output: string;
  timedOut: boolean;
  aborted: boolean;
  spawnError?: { code?: string; message: string };
};

export type RunCmdOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
};

export type RunImpl = (cmd: string, args: string[], cwd: string, opts?: RunCmdOptions) => Promise<CmdResult>;

const clamp = (value: string, max = 200000): string =>
  value.length > max ? `${value.slice(0, max)}...<truncated>` : value;

const clampTail = (value: string, max = 200000): string =>
  value.length > max ? `<truncated>...${value.slice(value.length - max)}` : value;

export const DEFAULT_TIMEOUT_MS = 120_000;

const usesProcessGroups = process.platform !== "win32";

export const runCmd: RunImpl = async (cmd, args, cwd, opts = {}) =>
  new Promise((resolve) => {
    const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const child = spawn(cmd, args, {
      cwd,
      shell: false,
      env: opts.env ?? process.env,
      detached: usesProcessGroups
    });
    let stdout = "";
    let stderr = "";
    let output = "";
    let timedOut = false;
    let aborted = false;
    let settled = false;

    // Gradle forks daemons and workers; signal the whole group.
    const killTree = (): void => {
      if (child.pid !== undefined && usesProcessGroups) {
        try {
          process.kill(-child.pid, "SIGKILL");
          return;
        } catch {
          // group already gone, fall through to the direct kill
        }
      }
      child.kill("SIGKILL");
    };

    const onAbort = (): void => {
      aborted = true;
      stderr += "\ncommand aborted";
      output += "\ncommand aborted";
      killTree();
    };

    const timer = setTimeout(() => {
      timedOut = true;
      const note = `\ncommand timed out after ${timeoutMs}ms`;
      stderr += note;
      output += note;
      killTree();
    }, timeoutMs);

    if (opts.signal?.aborted) {
      onAbort();
    } else {
      opts.signal?.addEventListener("abort", onAbort, { once: true });
    }

    const finish = (result: CmdResult): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      opts.signal?.removeEventListener("abort", onAbort);
      resolve(result);
    };

    child.stdout.on("data", (chunk) => {
      stdout += String(chunk);
      output += String(chunk);
    });

    child.stderr.on("data", (chunk) => {
      stderr += String(chunk);
      output += String(chunk);
    });

    child.on("close", (code) => {
      const finalCode = code ?? 1;
      finish({
        ok: finalCode === 0 && !timedOut && !aborted,
        code: finalCode,
        stdout: clamp(stdout),
        stderr: clamp(stderr),
        output: clampTail(output),
        timedOut,
        aborted
      });
    });

    child.on("error", (error: NodeJS.ErrnoException) => {
      finish({
        ok: false,
        code: 1,
        stdout: clamp(stdout),
        stderr: clamp(`${stderr}\n${error.message}`),
        output: clampTail(`${output}\n${error.message}`),
        timedOut,
        aborted,
        spawnError: { code: error.code, message: error.message }
      });
    });
  });
