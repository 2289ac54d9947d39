import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { loadEnvFile, parseEnvLine } from "../src/config/loadEnv.js";
import { DEFAULT_ORACLE_SETTINGS, DEFAULT_REPAIR_SETTINGS, loadRepairConfig } from "../src/config/repairConfig.js";
import { ConfigError } from "../src/runtime/errors.js";

describe("loadRepairConfig", () => {
  test("applies defaults for an empty environment", () => {
    expect(loadRepairConfig({})).toEqual({
      repair: DEFAULT_REPAIR_SETTINGS,
      oracle: DEFAULT_ORACLE_SETTINGS,
      workspaceDir: "./workspace",
      auditDir: undefined
    });
  });

  test("reads overrides and treats blank values as unset", () => {
    const config = loadRepairConfig({
      REPAIR_MAX_ATTEMPTS: "5",
      REPAIR_BUILD_ARGS: "assemble  --offline",
      REPAIR_FAIL_ON_PERSISTENT_TIMEOUT: "no",
      REPAIR_TEMPERATURE: "  ",
      REPAIR_AUDIT_DIR: ".audit"
    });

    expect(config.repair.maxAttempts).toBe(5);
    expect(config.repair.buildArgs).toEqual(["assemble", "--offline"]);
    expect(config.repair.failOnPersistentTimeout).toBe(false);
    expect(config.oracle.temperature).toBe(0.2);
    expect(config.auditDir).toBe(".audit");
  });

  test("rejects invalid numbers with one line per issue", () => {
    const load = (): unknown => loadRepairConfig({ REPAIR_MAX_ATTEMPTS: "0", REPAIR_BUILD_TIMEOUT_MS: "soon" });

    expect(load).toThrow(ConfigError);
    try {
      load();
    } catch (error) {
      const lines = error instanceof Error ? error.message.split("\n") : [];
      expect(lines[0]).toBe("Invalid repair configuration:");
      expect(lines.slice(1).map((line) => line.split(":")[0])).toEqual([
        "- REPAIR_MAX_ATTEMPTS",
        "- REPAIR_BUILD_TIMEOUT_MS"
      ]);
    }
  });
});

describe("loadEnvFile", () => {
  test("parses export prefixes and quotes", () => {
    expect(parseEnvLine("export OPENAI_MODEL='gpt-test'")).toEqual({ key: "OPENAI_MODEL", value: "gpt-test" });
    expect(parseEnvLine("# comment")).toBeNull();
    expect(parseEnvLine("NOVALUE")).toBeNull();
  });

  test("fills unset keys without overriding existing ones", async () => {
    const dir = await mkdtemp(join(tmpdir(), "gradle-mend-env-"));
    const envPath = join(dir, ".env");
    await writeFile(envPath, "REPAIR_MAX_ATTEMPTS=4\nOPENAI_API_KEY=\"test-secret\"\n", "utf8");
    const env: NodeJS.ProcessEnv = { REPAIR_MAX_ATTEMPTS: "2" };

    const loaded = loadEnvFile(envPath, env);

    expect(loaded).toEqual(["OPENAI_API_KEY"]);
    expect(env).toEqual({ REPAIR_MAX_ATTEMPTS: "2", OPENAI_API_KEY: "test-secret" });
  });
});
