import type { Command } from "commander";
import { runTriageLoop } from "../../autonomy/triage-loop/command.js";
import { DEFAULT_TRIAGE_WORKFLOW } from "../../autonomy/triage-loop/engine.js";
import { renderTriageMarkdown } from "../../autonomy/triage-loop/render.js";
import { createCliContext } from "../context.js";
import {
  addOutputOptions,
  choiceOption,
  emitReport,
  parseIntArg,
  readBoolean,
  readChoice,
  readNumber,
  readOptionalNumber,
  readString,
  runCommandAction,
  type CliOptions,
} from "../helpers.js";
import { COMMENT_TARGETS, LOOP_MODES, NOTIFY_MODES } from "./choices.js";

const SOURCE_EVENTS = ["workflow_dispatch", "workflow_run"] as const;

export function registerTriageLoopCommand(program: Command) {
  const command = program
    .command("triage-loop")
    .description("Poll the backlog workflow, optionally run a fix command, and report what remains")
    .option("--repo <owner/repo>", "Repository (default: $GITHUB_REPOSITORY)")
    .requiredOption("--branch <branch>", "Branch the workflow runs on")
    .option("--workflow <name>", "Workflow name or file", DEFAULT_TRIAGE_WORKFLOW)
    .addOption(choiceOption("--mode <mode>", "Execution mode", LOOP_MODES, "plan-then-fix"))
    .option("--fix-command <command>", "Fix command run between attempts")
    .option("--max-attempts <n>", "Attempts before giving up", parseIntArg, 3)
    .option("--run-list-limit <n>", "Runs fetched per listing", parseIntArg, 30)
    .option("--poll-seconds <n>", "Seconds between polls", parseIntArg, 20)
    .option("--timeout-seconds <n>", "Budget for waiting on a completed run", parseIntArg, 1800)
    .option("--fix-timeout-seconds <n>", "Timeout for the fix command (default: --timeout-seconds)", parseIntArg)
    .option("--source-run-id <id>", "Run id that triggered this loop", parseIntArg)
    .option("--source-run-sha <sha>", "Head sha expected on the source run")
    .addOption(choiceOption("--source-event <event>", "Trigger event", SOURCE_EVENTS, "workflow_dispatch"))
    .addOption(choiceOption("--notify <mode>", "Notification mode", NOTIFY_MODES, "summary-only"))
    .addOption(choiceOption("--comment-target <target>", "Where the summary comment goes", COMMENT_TARGETS, "auto"))
    .option("--comment-pr-number <n>", "Pull request for the summary comment", parseIntArg)
    .option("--plan-id <id>", "Plan id recorded in the report")
    .option("--dry-run", "Report what would run without calling the workflow API", false)
    .option("--emit-bundle", "Write markdown and JSON reports into the bundle directory", false)
    .option("--bundle-dir <dir>", "Bundle directory", "dev/reports/autonomy/triage")
    .option("--bundle-prefix <prefix>", "Bundle file prefix", "triage-loop");
  addOutputOptions(command, "md").action(async (_opts: CliOptions, cmd: Command) =>
    runCommandAction(async () => {
      const opts: CliOptions = cmd.optsWithGlobals();
      const ctx = await createCliContext({ opts, subsystem: "triage-loop" });
      const { exitCode, report } = await runTriageLoop(
        {
          repo: readString(opts, "repo"),
          branch: readString(opts, "branch") ?? "",
          workflow: readString(opts, "workflow") ?? DEFAULT_TRIAGE_WORKFLOW,
          mode: readChoice(opts, "mode", LOOP_MODES, "plan-then-fix"),
          fixCommand: readString(opts, "fixCommand"),
          maxAttempts: readNumber(opts, "maxAttempts", 3),
          runListLimit: readNumber(opts, "runListLimit", 30),
          pollSeconds: readNumber(opts, "pollSeconds", 20),
          timeoutSeconds: readNumber(opts, "timeoutSeconds", 1800),
          fixTimeoutSeconds: readOptionalNumber(opts, "fixTimeoutSeconds"),
          sourceRunId: readOptionalNumber(opts, "sourceRunId"),
          sourceRunSha: readString(opts, "sourceRunSha"),
          sourceEvent: readChoice(opts, "sourceEvent", SOURCE_EVENTS, "workflow_dispatch"),
          notify: readChoice(opts, "notify", NOTIFY_MODES, "summary-only"),
          commentTarget: readChoice(opts, "commentTarget", COMMENT_TARGETS, "auto"),
          commentPrNumber: readOptionalNumber(opts, "commentPrNumber"),
          planId: readString(opts, "planId"),
          dryRun: readBoolean(opts, "dryRun"),
          emitBundle: readBoolean(opts, "emitBundle"),
          bundleDir: readString(opts, "bundleDir") ?? "dev/reports/autonomy/triage",
          bundlePrefix: readString(opts, "bundlePrefix") ?? "triage-loop",
        },
        {
          config: ctx.config,
          policy: ctx.policy,
          client: ctx.client,
          clock: ctx.clock,
          logger: ctx.logger,
          env: process.env,
        },
      );
      return emitReport({
        opts,
        config: ctx.config,
        report,
        markdown: () => renderTriageMarkdown(report),
        exitCode,
      });
    }),
  );
}
