import type { Command } from "commander";
import {
  DEFAULT_PACKET_OUT,
  DEFAULT_QUEUE_OUT,
  renderControllerMarkdown,
  runAutonomyLoop,
} from "../../autonomy/controller/loop.js";
import { createRoundRunners } from "../../autonomy/controller/rounds.js";
import { createLiveTriageBuilder, defaultLiveTriageProbes } from "../../autonomy/packet/live-triage.js";
import { DEFAULT_TRIAGE_WORKFLOW } from "../../autonomy/triage-loop/engine.js";
import { createCliContext } from "../context.js";
import {
  addOutputOptions,
  choiceOption,
  emitReport,
  parseIntArg,
  parseNumberArg,
  readBoolean,
  readChoice,
  readNumber,
  readOptionalNumber,
  readString,
  runCommandAction,
  type CliOptions,
} from "../helpers.js";
import { COMMENT_TARGETS, LOOP_BRANCH_MODES, LOOP_MODES, NOTIFY_MODES } from "./choices.js";

export function registerAutonomyLoopCommand(program: Command) {
  const command = program
    .command("autonomy-loop")
    .description("Run bounded rounds of triage-loop and loop-packet with checkpoints and phone status")
    .option("--repo <owner/repo>", "Repository (default: $GITHUB_REPOSITORY)")
    .requiredOption("--plan-id <id>", "Stable plan identifier for this controller run")
    .option("--branch-base <branch>", "Integration branch", "develop")
    .option("--working-branch-prefix <prefix>", "Prefix for per-round working branch names", "autoloop")
    .option("--workflow <name>", "Backlog workflow name or file", DEFAULT_TRIAGE_WORKFLOW)
    .addOption(choiceOption("--mode <mode>", "Requested execution mode", LOOP_MODES, "report-only"))
    .addOption(
      choiceOption("--loop-branch-mode <mode>", "Run triage on the base or the working branch", LOOP_BRANCH_MODES, "base"),
    )
    .option("--fix-command <command>", "Fix command for plan-then-fix and fix-only")
    .option("--max-rounds <n>", "Round budget", parseIntArg, 6)
    .option("--max-hours <hours>", "Wall-clock budget", parseNumberArg, 4)
    .option("--max-tasks <n>", "Task budget", parseIntArg, 24)
    .option("--checkpoint-every <n>", "Copy a checkpoint to the inbox every N rounds", parseIntArg, 1)
    .option("--loop-max-attempts <n>", "Attempts per triage-loop round", parseIntArg, 1)
    .option("--run-list-limit <n>", "Runs fetched per listing", parseIntArg, 30)
    .option("--poll-seconds <n>", "Seconds between polls", parseIntArg, 20)
    .option("--timeout-seconds <n>", "Budget for waiting on a completed run", parseIntArg, 1800)
    .addOption(choiceOption("--notify <mode>", "Notification mode", NOTIFY_MODES, "summary-only"))
    .addOption(choiceOption("--comment-target <target>", "Where the summary comment goes", COMMENT_TARGETS, "auto"))
    .option("--comment-pr-number <n>", "Pull request for the summary comment", parseIntArg)
    .option("--packet-out <dir>", "Packet root (policy packet_root wins)", DEFAULT_PACKET_OUT)
    .option("--queue-out <dir>", "Queue root (policy queue_root wins)", DEFAULT_QUEUE_OUT)
    .option("--max-packet-age-hours <hours>", "Maximum source age for round packets", parseNumberArg, 72)
    .option("--max-draft-chars <n>", "Hard cap for draft text", parseIntArg, 1600)
    .option("--allow-auto-send", "Allow low-risk resolved packets to be auto-send eligible", false)
    .option("--terminal-trace-lines <n>", "Trace lines kept per checkpoint", parseIntArg, 12)
    .option("--dry-run", "Run rounds without calling the workflow API", false);
  addOutputOptions(command, "json").action(async (_opts: CliOptions, cmd: Command) =>
    runCommandAction(async () => {
      const opts: CliOptions = cmd.optsWithGlobals();
      const ctx = await createCliContext({ opts, subsystem: "autonomy-loop" });
      const liveTriage = createLiveTriageBuilder({
        probes: defaultLiveTriageProbes({ cwd: ctx.config.repoRoot, client: ctx.client }),
        clock: ctx.clock,
      });
      const runners = createRoundRunners({
        config: ctx.config,
        policy: ctx.policy,
        client: ctx.client,
        clock: ctx.clock,
        liveTriage,
        logger: ctx.logger,
        env: process.env,
      });
      const { exitCode, report } = await runAutonomyLoop(
        {
          repo: readString(opts, "repo"),
          planId: readString(opts, "planId") ?? "",
          branchBase: readString(opts, "branchBase") ?? "develop",
          workingBranchPrefix: readString(opts, "workingBranchPrefix") ?? "autoloop",
          workflow: readString(opts, "workflow") ?? DEFAULT_TRIAGE_WORKFLOW,
          mode: readChoice(opts, "mode", LOOP_MODES, "report-only"),
          loopBranchMode: readChoice(opts, "loopBranchMode", LOOP_BRANCH_MODES, "base"),
          fixCommand: readString(opts, "fixCommand"),
          maxRounds: readNumber(opts, "maxRounds", 6),
          maxHours: readNumber(opts, "maxHours", 4),
          maxTasks: readNumber(opts, "maxTasks", 24),
          checkpointEvery: readNumber(opts, "checkpointEvery", 1),
          loopMaxAttempts: readNumber(opts, "loopMaxAttempts", 1),
          runListLimit: readNumber(opts, "runListLimit", 30),
          pollSeconds: readNumber(opts, "pollSeconds", 20),
          timeoutSeconds: readNumber(opts, "timeoutSeconds", 1800),
          notify: readChoice(opts, "notify", NOTIFY_MODES, "summary-only"),
          commentTarget: readChoice(opts, "commentTarget", COMMENT_TARGETS, "auto"),
          commentPrNumber: readOptionalNumber(opts, "commentPrNumber"),
          packetOut: readString(opts, "packetOut") ?? DEFAULT_PACKET_OUT,
          queueOut: readString(opts, "queueOut") ?? DEFAULT_QUEUE_OUT,
          maxPacketAgeHours: readNumber(opts, "maxPacketAgeHours", 72),
          maxDraftChars: readNumber(opts, "maxDraftChars", 1600),
          allowAutoSend: readBoolean(opts, "allowAutoSend"),
          terminalTraceLines: readNumber(opts, "terminalTraceLines", 12),
          dryRun: readBoolean(opts, "dryRun"),
        },
        {
          config: ctx.config,
          policy: ctx.policy,
          clock: ctx.clock,
          runners,
          logger: ctx.logger,
          eventLog: ctx.eventLog,
        },
      );
      return emitReport({
        opts,
        config: ctx.config,
        report,
        markdown: () => renderControllerMarkdown(report),
        exitCode,
      });
    }),
  );
}
