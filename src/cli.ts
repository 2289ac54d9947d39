#!/usr/bin/env node
/**
 * Run examples:
 * - `npm run dev -- ./my-gradle-app`
 * - `npm run dev -- --project ./my-gradle-app --max-attempts 5 --review`
 * - `npm run dev -- --project https://example.com/acme/app.git --name kotlinVersion --value 1.9.24`
 *
 * LLM env:
 * - `export OPENAI_API_KEY=...` (optionally `OPENAI_MODEL`)
 * - or `export OPENAI_BASE_URL=http://localhost:8080/v1` for a local OpenAI-compatible server
 */
import { stat } from "node:fs/promises";
import process from "node:process";
import chalk from "chalk";
import { ZodError } from "zod";
import { loadEnvFile } from "./config/loadEnv.js";
import { loadRepairConfig, type RepairSettings } from "./config/repairConfig.js";
import { getProviderFromEnv } from "./llm/index.js";
import { LlmFixOracle } from "./oracle/llmOracle.js";
import { createRepairPanel } from "./cli/ui/repairPanel.js";
import { runRepairSession } from "./repair/session.js";
import { GitSourceFetcher, LocalSourceFetcher, type SourceFetcher } from "./service/sourceFetcher.js";
import { updateAndBuild } from "./service/updateAndBuild.js";

type CliOptions = {
  project?: string;
  name?: string;
  value?: string;
  maxAttempts?: number;
  review: boolean;
  auditDir?: string;
};

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const printValidationErrors = (error: ZodError): void => {
  console.error("Request validation failed:");
  error.issues.forEach((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    console.error(`- ${path}: ${issue.message}`);
  });
};

const parseArgs = (argv: string[]): CliOptions => {
  let project: string | undefined;
  let name: string | undefined;
  let value: string | undefined;
  let maxAttempts: number | undefined;
  let review = false;
  let auditDir: string | undefined;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (arg === "--project") {
      project = argv[i + 1];
      i += 1;
      continue;
    }
    if (arg === "--name") {
      name = argv[i + 1];
      i += 1;
      continue;
    }
    if (arg === "--value") {
      value = argv[i + 1];
      i += 1;
      continue;
    }
    if (arg === "--max-attempts") {
      const raw = Number(argv[i + 1]);
      if (!Number.isInteger(raw) || raw < 1) {
        throw new UsageError(`--max-attempts expects a positive integer, got ${argv[i + 1] ?? "nothing"}`);
      }
      maxAttempts = raw;
      i += 1;
      continue;
    }
    if (arg === "--audit-dir") {
      auditDir = argv[i + 1];
      i += 1;
      continue;
    }
    if (arg === "--review") {
      review = true;
      continue;
    }

    if (!arg.startsWith("-") && !project) {
      project = arg;
      continue;
    }
    throw new UsageError(`Unknown argument: ${arg}`);
  }

  if ((name === undefined) !== (value === undefined)) {
    throw new UsageError("--name and --value must be given together");
  }

  return { project, name, value, maxAttempts, review, auditDir };
};

const usage = (): void => {
  console.error("Usage:");
  console.error("- gradle-mend <project-dir|git-url> [--max-attempts N] [--review] [--audit-dir <dir>]");
  console.error("- gradle-mend --project <project-dir|git-url> --name <property> --value <version> [...]");
};

const isDirectory = async (path: string): Promise<boolean> => {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
};

const run = async (options: CliOptions, signal: AbortSignal): Promise<boolean> => {
  const project = options.project;
  if (!project) {
    usage();
    throw new UsageError("missing project");
  }

  const config = loadRepairConfig(process.env);
  const settings: RepairSettings = {
    ...config.repair,
    maxAttempts: options.maxAttempts ?? config.repair.maxAttempts
  };
  const auditDir = options.auditDir ?? config.auditDir;
  const oracle = new LlmFixOracle(getProviderFromEnv(), config.oracle);
  const ui = createRepairPanel({ project, maxAttempts: settings.maxAttempts });
  const reviewPatch = options.review ? ui.reviewPatch : undefined;

  const fetcher: SourceFetcher = (await isDirectory(project))
    ? new LocalSourceFetcher()
    : new GitSourceFetcher(config.workspaceDir);

  if (options.name !== undefined && options.value !== undefined) {
    const response = await updateAndBuild(
      { projectUrl: project, dependencyName: options.name, dependencyValue: options.value },
      { fetcher, oracle, settings, signal, onEvent: ui.onEvent, reviewPatch, auditDir }
    );
    console.log(`Result: ${response.status} after ${response.attempts} attempt(s)`);
    if (response.reason) console.log(`Reason: ${response.reason}`);
    if (response.lastAppliedFix) {
      console.log("Last applied fix:");
      console.log(chalk.dim(response.lastAppliedFix));
    }
    if (response.status !== "success" && response.finalBuildOutput) {
      console.log("Final build output (tail):");
      console.log(response.finalBuildOutput);
    }
    return response.status === "success";
  }

  const projectPath = await fetcher.ensureProject(project, { signal });
  const outcome = await runRepairSession({
    projectPath,
    oracle,
    settings,
    signal,
    onEvent: ui.onEvent,
    reviewPatch,
    auditDir
  });

  console.log(`Result: ${outcome.status} after ${outcome.builds} build(s), ${outcome.attempts.length} attempt(s)`);
  if (outcome.message) console.log(outcome.message);
  if (outcome.auditPath) console.log(`Audit log: ${outcome.auditPath}`);
  return outcome.status === "success";
};

const main = async (): Promise<void> => {
  loadEnvFile();
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  try {
    const options = parseArgs(process.argv.slice(2));
    const ok = await run(options, controller.signal);
    process.exitCode = ok ? 0 : 1;
  } catch (error) {
    if (error instanceof ZodError) {
      printValidationErrors(error);
      process.exitCode = 2;
      return;
    }

    if (error instanceof Error) {
      console.error(chalk.red(error.message));
      process.exitCode = 2;
      return;
    }

    console.error("Unknown error");
    process.exitCode = 2;
  }
};

void main();
