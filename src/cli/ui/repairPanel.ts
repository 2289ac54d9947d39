import chalk from "chalk";
import ora from "ora";
import logUpdate from "log-update";
import boxen from "boxen";
import prompts from "prompts";
import type { FixProposal } from "../../oracle/types.js";
import type { RepairEvent } from "../../workflow/events.js";
import type { PatchReviewFn } from "../../workflow/nodes.js";

const truncate = (value: string | undefined, max = 200): string | undefined => {
  if (!value) return value;
  return value.length > max ? `${value.slice(0, max)}...` : value;
};

const describeProposal = (proposal: FixProposal): string => {
  switch (proposal.action) {
    case "append":
      return `append to ${proposal.targetFile}`;
    case "replace_match":
      return `replace /${proposal.matchPattern}/${proposal.matchFlags ?? ""} in ${proposal.targetFile}`;
    case "no_fix":
      return "no fix";
    case "invalid":
      return `unparsable (${proposal.reason})`;
  }
};

export const createRepairPanel = (args: {
  project: string;
  maxAttempts: number;
}): {
  onEvent: (event: RepairEvent) => void;
  reviewPatch: PatchReviewFn;
} => {
  const panelState: {
    project: string;
    attempt: number;
    maxAttempts: number;
    builds: number;
    status: string;
    lastProposal?: string;
    lastError?: string;
  } = {
    project: args.project,
    attempt: 0,
    maxAttempts: args.maxAttempts,
    builds: 0,
    status: "starting"
  };

  let activeSpinner: ReturnType<typeof ora> | undefined;

  const renderPanel = (): void => {
    const body = [
      `${chalk.bold("Project")}: ${panelState.project}`,
      `${chalk.bold("Attempt")}: ${panelState.attempt}/${panelState.maxAttempts}`,
      `${chalk.bold("Builds")}: ${panelState.builds}`,
      `${chalk.bold("Status")}: ${panelState.status}`,
      `${chalk.bold("Last proposal")}: ${panelState.lastProposal ?? "-"}`,
      `${chalk.bold("Last error")}: ${panelState.lastError ?? "-"}`
    ].join("\n");

    logUpdate(
      boxen(body, {
        borderColor: "cyan",
        padding: { left: 1, right: 1, top: 0, bottom: 0 },
        margin: { top: 0, bottom: 1 },
        title: "gradle-mend",
        titleAlignment: "left"
      })
    );
  };

  const stopSpinner = (ok: boolean, text: string): void => {
    if (activeSpinner?.isSpinning) {
      if (ok) activeSpinner.succeed(text);
      else activeSpinner.fail(text);
    }
    activeSpinner = undefined;
  };

  const onEvent = (event: RepairEvent): void => {
    switch (event.type) {
      case "session_start":
        panelState.maxAttempts = event.maxAttempts;
        break;
      case "build_start":
        panelState.status = "building";
        logUpdate.done();
        activeSpinner = ora(`gradle build #${event.build}`).start();
        break;
      case "build_end":
        panelState.builds = event.build;
        stopSpinner(
          event.ok,
          `gradle build #${event.build} ${event.ok ? "passed" : event.timedOut ? "timed out" : "failed"} (${Math.round(event.durationMs / 1000)}s)`
        );
        break;
      case "diagnostic":
        panelState.lastError = truncate(event.text.split("\n")[0], 160);
        break;
      case "oracle_start":
        panelState.attempt = event.attempt;
        panelState.status = "asking oracle";
        logUpdate.done();
        activeSpinner = ora(`consulting ${event.oracle}`).start();
        break;
      case "proposal": {
        const ok = event.proposal.action === "append" || event.proposal.action === "replace_match";
        panelState.lastProposal = describeProposal(event.proposal);
        stopSpinner(ok, `oracle: ${panelState.lastProposal}`);
        break;
      }
      case "patch_applied":
        panelState.status = "applied";
        console.log(
          event.applied
            ? chalk.green(`✓ patched ${event.filePath}${event.note ? ` (${event.note})` : ""}`)
            : chalk.yellow(`• ${event.filePath} unchanged (${event.note ?? "not applicable"})`)
        );
        break;
      case "done":
        if (activeSpinner?.isSpinning) {
          stopSpinner(event.status === "success", event.message ?? event.status);
        }
        panelState.status = event.status === "success" ? "repaired" : `${event.status}${event.reason ? ` (${event.reason})` : ""}`;
        if (event.message) panelState.lastError = truncate(event.message, 220);
        break;
      default:
        break;
    }
    renderPanel();
  };

  const reviewPatch: PatchReviewFn = async ({ proposal, attempt }): Promise<boolean> => {
    logUpdate.done();
    console.log(chalk.yellow(`\nAttempt ${attempt}: ${describeProposal(proposal)}`));
    console.log(chalk.dim(proposal.content));
    const answer = await prompts({
      type: "confirm",
      name: "approve",
      message: "Apply this change?",
      initial: true
    });
    return answer.approve === true;
  };

  return { onEvent, reviewPatch };
};
