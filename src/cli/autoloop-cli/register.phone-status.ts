import type { Command } from "commander";
import { DEFAULT_PHONE_JSON, renderPhoneReportMarkdown, runPhoneStatus } from "../../autonomy/phone/command.js";
import { createCliContext } from "../context.js";
import {
  addOutputOptions,
  choiceOption,
  emitReport,
  readChoice,
  readString,
  runCommandAction,
  type CliOptions,
} from "../helpers.js";
import { PHONE_VIEWS } from "./choices.js";

export function registerPhoneStatusCommand(program: Command) {
  const command = program
    .command("phone-status")
    .description("Render one projection of the latest phone status artifact")
    .option("--phone-json <path>", "Phone status artifact", DEFAULT_PHONE_JSON)
    .addOption(choiceOption("--view <view>", "Projection to render", PHONE_VIEWS, "compact"))
    .option("--emit-projections <dir>", "Also write every projection into this directory");
  addOutputOptions(command, "md").action(async (_opts: CliOptions, cmd: Command) =>
    runCommandAction(async () => {
      const opts: CliOptions = cmd.optsWithGlobals();
      const ctx = await createCliContext({ opts, subsystem: "phone-status" });
      const { exitCode, report } = await runPhoneStatus(
        {
          phoneJson: readString(opts, "phoneJson") ?? DEFAULT_PHONE_JSON,
          view: readChoice(opts, "view", PHONE_VIEWS, "compact"),
          emitProjections: readString(opts, "emitProjections"),
        },
        { config: ctx.config, clock: ctx.clock },
      );
      return emitReport({
        opts,
        config: ctx.config,
        report,
        markdown: () => renderPhoneReportMarkdown(report),
        exitCode,
      });
    }),
  );
}
