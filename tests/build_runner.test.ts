import { chmod, mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { resolveBuildEntry, runBuild } from "../src/build/buildRunner.js";
import { BuildInvocationError } from "../src/runtime/errors.js";
import { cmdResult, createGradleProject, scriptedRunner } from "./helpers/fakeRunner.js";

describe("resolveBuildEntry", () => {
  test("prefers the project wrapper", async () => {
    const root = await createGradleProject();

    expect(await resolveBuildEntry(root, { pathEnv: "", platform: "linux" })).toEqual({
      command: join(root, "gradlew"),
      args: ["build", "--stacktrace"],
      source: "wrapper"
    });
  });

  test("runs a non-executable wrapper through sh", async () => {
    const root = await mkdtemp(join(tmpdir(), "gradle-mend-build-"));
    await writeFile(join(root, "gradlew"), "#!/bin/sh\n", "utf8");
    await chmod(join(root, "gradlew"), 0o644);

    expect(await resolveBuildEntry(root, { args: ["assemble"], pathEnv: "", platform: "linux" })).toEqual({
      command: "sh",
      args: [join(root, "gradlew"), "assemble"],
      source: "wrapper"
    });
  });

  test("falls back to gradle on PATH", async () => {
    const root = await mkdtemp(join(tmpdir(), "gradle-mend-build-"));
    const bin = join(root, "bin");
    await mkdir(bin);
    await writeFile(join(bin, "gradle"), "#!/bin/sh\n", "utf8");
    await chmod(join(bin, "gradle"), 0o755);

    const entry = await resolveBuildEntry(root, { pathEnv: bin, platform: "linux" });

    expect(entry).toEqual({ command: join(bin, "gradle"), args: ["build", "--stacktrace"], source: "global" });
  });

  test("raises BuildInvocationError when nothing can run the build", async () => {
    const root = await mkdtemp(join(tmpdir(), "gradle-mend-build-"));

    await expect(resolveBuildEntry(root, { pathEnv: "", platform: "linux" })).rejects.toBeInstanceOf(
      BuildInvocationError
    );
  });
});

describe("runBuild", () => {
  test("maps the command result and passes the timeout through", async () => {
    const root = await createGradleProject();
    const { run, calls } = scriptedRunner([
      cmdResult({ ok: false, code: 1, output: "FAILURE: Build failed with an exception." })
    ]);

    const result = await runBuild(root, { runImpl: run, timeoutMs: 5000 });

    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(1);
    expect(result.timedOut).toBe(false);
    expect(result.rawOutput).toBe("FAILURE: Build failed with an exception.");
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
    expect(calls[0].cwd).toBe(root);
    expect(calls[0].opts?.timeoutMs).toBe(5000);
  });

  test("reports a timeout as a failed result", async () => {
    const root = await createGradleProject();
    const { run } = scriptedRunner([cmdResult({ timedOut: true, code: 1 })]);

    const result = await runBuild(root, { runImpl: run });

    expect(result.success).toBe(false);
    expect(result.timedOut).toBe(true);
  });

  test("refuses commands outside the allow list", async () => {
    const root = await createGradleProject();
    const { run, calls } = scriptedRunner([cmdResult()]);

    await expect(
      runBuild(root, { runImpl: run, entry: { command: "/usr/bin/make", args: [], source: "global" } })
    ).rejects.toThrow("Command not allowed by policy: /usr/bin/make");
    expect(calls).toEqual([]);
  });

  test("raises BuildInvocationError when the process cannot start", async () => {
    const root = await createGradleProject();
    const { run } = scriptedRunner([cmdResult({ spawnError: { code: "ENOENT", message: "spawn gradlew ENOENT" } })]);

    await expect(runBuild(root, { runImpl: run })).rejects.toThrow(
      `Could not start ${join(root, "gradlew")}: spawn gradlew ENOENT`
    );
  });
});
