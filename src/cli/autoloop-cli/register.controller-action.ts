import type { Command } from "commander";
import {
  DEFAULT_MODE_FILE,
  executeControllerAction,
  renderControllerActionMarkdown,
} from "../../autonomy/actions/controller-action.js";
import { DEFAULT_PHONE_JSON } from "../../autonomy/phone/command.js";
import { createCliContext } from "../context.js";
import {
  addOutputOptions,
  choiceOption,
  emitReport,
  parseIntArg,
  readBoolean,
  readChoice,
  readNumber,
  readString,
  runCommandAction,
  type CliOptions,
} from "../helpers.js";
import { PHONE_VIEWS } from "./choices.js";

export const DEFAULT_DISPATCH_WORKFLOW = ".github/workflows/backlog-triage.yml";

export function registerControllerActionCommand(program: Command) {
  const command = program
    .command("controller-action")
    .description("Run one policy-gated action (refresh-status|dispatch-report-only|pause-loop|resume-loop)")
    .requiredOption("--action <action>", "Controller action to execute")
    .option("--repo <owner/repo>", "Repository (default: $GITHUB_REPOSITORY)")
    .option("--branch <branch>", "Target branch for dispatch-report-only", "develop")
    .option("--workflow <path>", "Workflow file for dispatch-report-only", DEFAULT_DISPATCH_WORKFLOW)
    .option("--max-attempts <n>", "max_attempts forwarded to the dispatched workflow", parseIntArg, 3)
    .option("--phone-json <path>", "Phone status artifact read by refresh-status", DEFAULT_PHONE_JSON)
    .addOption(choiceOption("--view <view>", "Projection used by refresh-status", PHONE_VIEWS, "compact"))
    .option("--mode-file <path>", "Local mode state written by pause/resume", DEFAULT_MODE_FILE)
    .option("--remote", "Mirror pause/resume to the AUTONOMY_MODE repository variable", true)
    .option("--no-remote", "Only write the local mode state")
    .option("--dry-run", "Record intended remote calls without executing them", false);
  addOutputOptions(command, "md").action(async (_opts: CliOptions, cmd: Command) =>
    runCommandAction(async () => {
      const opts: CliOptions = cmd.optsWithGlobals();
      const ctx = await createCliContext({ opts, subsystem: "controller-action" });
      const { exitCode, report } = await executeControllerAction(
        {
          action: readString(opts, "action") ?? "",
          repo: readString(opts, "repo"),
          branch: readString(opts, "branch") ?? "develop",
          workflow: readString(opts, "workflow") ?? DEFAULT_DISPATCH_WORKFLOW,
          maxAttempts: readNumber(opts, "maxAttempts", 3),
          view: readChoice(opts, "view", PHONE_VIEWS, "compact"),
          phoneJson: readString(opts, "phoneJson") ?? DEFAULT_PHONE_JSON,
          modeFile: readString(opts, "modeFile") ?? DEFAULT_MODE_FILE,
          remote: readBoolean(opts, "remote"),
          dryRun: readBoolean(opts, "dryRun"),
        },
        {
          config: ctx.config,
          policy: ctx.policy,
          client: ctx.client,
          clock: ctx.clock,
          logger: ctx.logger,
          eventLog: ctx.eventLog,
        },
      );
      return emitReport({
        opts,
        config: ctx.config,
        report,
        markdown: () => renderControllerActionMarkdown(report),
        exitCode,
      });
    }),
  );
}
