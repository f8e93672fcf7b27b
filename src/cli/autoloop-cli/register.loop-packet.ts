import type { Command } from "commander";
import { buildLoopPacket, renderLoopPacketMarkdown } from "../../autonomy/packet/builder.js";
import { createLiveTriageBuilder, defaultLiveTriageProbes } from "../../autonomy/packet/live-triage.js";
import { createCliContext } from "../context.js";
import {
  addOutputOptions,
  choiceOption,
  collectArg,
  emitReport,
  parseIntArg,
  parseNumberArg,
  readBoolean,
  readChoice,
  readNumber,
  readString,
  readStringList,
  runCommandAction,
  type CliOptions,
} from "../helpers.js";
import { SOURCE_PREFERENCES } from "./choices.js";

export function registerLoopPacketCommand(program: Command) {
  const command = program
    .command("loop-packet")
    .description("Build a guarded terminal draft packet from the freshest loop or triage artifact")
    .option("--source-json <path>", "Explicit artifact path (repeatable)", collectArg)
    .addOption(
      choiceOption("--prefer-source <kind>", "Preferred source kind", SOURCE_PREFERENCES, "triage-loop"),
    )
    .option("--max-age-hours <hours>", "Reject sources older than this", parseNumberArg, 72)
    .option("--max-draft-chars <n>", "Hard cap for the draft text", parseIntArg, 1600)
    .option("--allow-auto-send", "Mark low-risk resolved packets as auto-send eligible", false)
    .option("--repo <owner/repo>", "Repository used for live CI probes (default: $GITHUB_REPOSITORY)")
    .option("--dev-log-sessions <n>", "Scan this many recent dev-log sessions during live triage", parseIntArg, 0);
  addOutputOptions(command, "json").action(async (_opts: CliOptions, cmd: Command) =>
    runCommandAction(async () => {
      const opts: CliOptions = cmd.optsWithGlobals();
      const ctx = await createCliContext({ opts, subsystem: "loop-packet" });
      const hasRepo = Boolean(readString(opts, "repo") ?? ctx.config.repo);
      const liveTriage = createLiveTriageBuilder({
        probes: defaultLiveTriageProbes({
          cwd: ctx.config.repoRoot,
          client: hasRepo ? ctx.client : undefined,
          devLogSessions: readNumber(opts, "devLogSessions", 0),
        }),
        clock: ctx.clock,
      });
      const { exitCode, report } = await buildLoopPacket(
        {
          sourceJson: readStringList(opts, "sourceJson"),
          preferSource: readChoice(opts, "preferSource", SOURCE_PREFERENCES, "triage-loop"),
          maxAgeHours: readNumber(opts, "maxAgeHours", 72),
          maxDraftChars: readNumber(opts, "maxDraftChars", 1600),
          allowAutoSend: readBoolean(opts, "allowAutoSend"),
        },
        { clock: ctx.clock, cwd: ctx.config.repoRoot, liveTriage },
      );
      return emitReport({
        opts,
        config: ctx.config,
        report,
        markdown: () => renderLoopPacketMarkdown(report),
        exitCode,
      });
    }),
  );
}
