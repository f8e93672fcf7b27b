import fs from "node:fs/promises";
import path from "node:path";
import type { RuntimeConfig } from "../../config/runtime-config.js";
import type { Clock } from "../../infra/clock.js";
import { formatError } from "../../infra/errors.js";
import { writeJsonAtomic } from "../../infra/json-file.js";
import type { AutonomyLogger } from "../../logging/subsystem.js";
import type { EventLogWriter } from "../ledger/store.js";
import { buildLoopPacket, type LoopPacketOptions, type LoopPacketResult } from "../packet/builder.js";
import type { LiveTriageBuilder } from "../packet/live-triage.js";
import { buildPhoneStatus, renderPhoneStatusMarkdown } from "../phone/status.js";
import type { ControlPlanePolicy } from "../policy/types.js";
import { runTriageLoop, type TriageLoopCommandResult, type TriageLoopOptions } from "../triage-loop/command.js";
import type { FixCommandRunner } from "../triage-loop/fix-runner.js";
import {
  isHardReasonCode,
  type BudgetReason,
  type CheckpointPacket,
  type CommentTarget,
  type ControllerReason,
  type ControllerRound,
  type LoopBranchMode,
  type LoopMode,
  type NotifyMode,
} from "../types.js";
import type { WorkflowClient } from "../workflow/types.js";
import { buildCheckpointPacket } from "./checkpoint.js";
import { formatRound, roundDirectory, writeInboxPacket, writeRoundPhoneStatus, type QueueLayout } from "./queue.js";
import {
  packetRisk,
  readPacketSnapshot,
  readTriageSnapshot,
  type PacketSnapshot,
  type TriageSnapshot,
} from "./reports.js";

/** The two commands a round chains. Both must leave a report behind for the round to continue. */
export type RoundRunners = {
  triage: (options: TriageLoopOptions) => Promise<TriageLoopCommandResult>;
  packet: (options: LoopPacketOptions) => Promise<LoopPacketResult>;
};

export function createRoundRunners(params: {
  config: RuntimeConfig;
  policy: ControlPlanePolicy;
  client: WorkflowClient;
  clock: Clock;
  liveTriage: LiveTriageBuilder;
  logger?: AutonomyLogger;
  runFix?: FixCommandRunner;
  env?: Readonly<Record<string, string | undefined>>;
}): RoundRunners {
  return {
    triage: (options) =>
      runTriageLoop(options, {
        config: params.config,
        policy: params.policy,
        client: params.client,
        clock: params.clock,
        logger: params.logger,
        runFix: params.runFix,
        env: params.env,
      }),
    packet: (options) =>
      buildLoopPacket(options, {
        clock: params.clock,
        cwd: params.config.repoRoot,
        liveTriage: params.liveTriage,
      }),
  };
}

export type RoundSettings = {
  repo: string;
  planId: string;
  branchBase: string;
  workingBranchPrefix: string;
  workflow: string;
  modeEffective: LoopMode;
  loopBranchMode: LoopBranchMode;
  fixCommand?: string;
  maxRounds: number;
  maxHours: number;
  maxTasks: number;
  checkpointEvery: number;
  loopMaxAttempts: number;
  runListLimit: number;
  pollSeconds: number;
  timeoutSeconds: number;
  notify: NotifyMode;
  commentTarget: CommentTarget;
  commentPrNumber?: number;
  maxPacketAgeHours: number;
  maxDraftChars: number;
  allowAutoSend: boolean;
  terminalTraceLines: number;
  dryRun: boolean;
  replayWindowSeconds: number;
};

export type RoundContext = {
  settings: RoundSettings;
  controllerRunId: string;
  runPacketRoot: string;
  layout: QueueLayout;
  runners: RoundRunners;
  clock: Clock;
  logger: AutonomyLogger;
  eventLog: EventLogWriter;
  actor: string;
  nonce: () => string;
  warnings: string[];
  errors: string[];
};

export type RoundsOutcome = {
  startedAt: number;
  rounds: ControllerRound[];
  tasksCompleted: number;
  resolved: boolean;
  reason: ControllerReason;
  latestPacket: string | null;
  latestWorkingBranch: string | null;
  lastTriage: TriageSnapshot | null;
  lastPacket: PacketSnapshot | null;
  lastCheckpoint: CheckpointPacket | null;
};

function budgetExhausted(ctx: RoundContext, startedAt: number, tasksCompleted: number): BudgetReason | null {
  if (ctx.clock.now() - startedAt > ctx.settings.maxHours * 3_600_000) {
    return "max_hours_reached";
  }
  if (tasksCompleted >= ctx.settings.maxTasks) {
    return "max_tasks_reached";
  }
  return null;
}

async function runStep<T extends { exitCode: number; report: unknown }>(
  ctx: RoundContext,
  label: string,
  run: () => Promise<T>,
  outputPath: string,
) {
  try {
    const result = await run();
    await writeJsonAtomic(outputPath, result.report);
    return result.exitCode;
  } catch (err) {
    ctx.warnings.push(`${label} did not produce a report: ${formatError(err)}`);
    return 2;
  }
}

/**
 * Sequential rounds of triage-loop then loop-packet. Each round reads both reports back
 * from disk, so a round only acts on what it persisted. Budgets are checked before a round
 * starts and never interrupt one in flight.
 */
export async function runControllerRounds(ctx: RoundContext): Promise<RoundsOutcome> {
  const { settings } = ctx;
  const outcome: RoundsOutcome = {
    startedAt: ctx.clock.now(),
    rounds: [],
    tasksCompleted: 0,
    resolved: false,
    reason: "max_rounds_reached",
    latestPacket: null,
    latestWorkingBranch: null,
    lastTriage: null,
    lastPacket: null,
    lastCheckpoint: null,
  };

  for (let round = 1; round <= settings.maxRounds; round += 1) {
    const exhausted = budgetExhausted(ctx, outcome.startedAt, outcome.tasksCompleted);
    if (exhausted) {
      outcome.reason = exhausted;
      break;
    }

    const tag = formatRound(round);
    const workingBranch = `${settings.workingBranchPrefix}/${settings.planId}/${ctx.controllerRunId}/r${tag}`;
    outcome.latestWorkingBranch = workingBranch;
    const loopBranch = settings.loopBranchMode === "base" ? settings.branchBase : workingBranch;
    const roundDir = roundDirectory(ctx.runPacketRoot, round);
    await fs.mkdir(roundDir, { recursive: true });
    const triagePath = path.join(roundDir, "triage-loop.json");
    const packetPath = path.join(roundDir, "loop-packet.json");
    ctx.logger.info(`round ${round}: triage-loop on ${loopBranch}`);

    const triageExitCode = await runStep(
      ctx,
      `round ${round}: triage-loop`,
      () =>
        ctx.runners.triage({
          repo: settings.repo,
          branch: loopBranch,
          workflow: settings.workflow,
          mode: settings.modeEffective,
          fixCommand: settings.fixCommand,
          maxAttempts: settings.loopMaxAttempts,
          runListLimit: settings.runListLimit,
          pollSeconds: settings.pollSeconds,
          timeoutSeconds: settings.timeoutSeconds,
          sourceEvent: "workflow_dispatch",
          notify: settings.notify,
          commentTarget: settings.commentTarget,
          commentPrNumber: settings.commentPrNumber,
          planId: settings.planId,
          dryRun: settings.dryRun,
          emitBundle: true,
          bundleDir: roundDir,
          bundlePrefix: `triage-loop-r${tag}`,
        }),
      triagePath,
    );
    const triageRead = await readTriageSnapshot(triagePath);
    if (!triageRead.ok) {
      ctx.errors.push(`round ${round}: failed to read triage-loop report (${triageRead.error})`);
      outcome.reason = "triage_report_missing";
      break;
    }
    const triage = triageRead.value;

    const packetExitCode = await runStep(
      ctx,
      `round ${round}: loop-packet`,
      () =>
        ctx.runners.packet({
          sourceJson: [triagePath],
          preferSource: "triage-loop",
          maxAgeHours: settings.maxPacketAgeHours,
          maxDraftChars: settings.maxDraftChars,
          allowAutoSend: settings.allowAutoSend,
        }),
      packetPath,
    );
    const packetRead = await readPacketSnapshot(packetPath);
    if (!packetRead.ok) {
      ctx.errors.push(`round ${round}: failed to read loop-packet report (${packetRead.error})`);
      outcome.reason = "packet_report_missing";
      break;
    }
    const packet = packetRead.value;

    const checkpoint = buildCheckpointPacket({
      planId: settings.planId,
      controllerRunId: ctx.controllerRunId,
      branchBase: settings.branchBase,
      workingBranch,
      round,
      triage,
      packet,
      replayWindowSeconds: settings.replayWindowSeconds,
      traceLines: settings.terminalTraceLines,
      evidenceRefs: [triagePath, packetPath],
      now: ctx.clock.now(),
      nonce: ctx.nonce(),
    });
    const checkpointPath = await writeJsonAtomic(path.join(roundDir, "checkpoint-packet.json"), checkpoint);
    outcome.lastTriage = triage;
    outcome.lastPacket = packet;
    outcome.lastCheckpoint = checkpoint;

    const phonePayload = buildPhoneStatus({
      now: ctx.clock.now(),
      planId: settings.planId,
      controllerRunId: ctx.controllerRunId,
      repo: settings.repo,
      branchBase: settings.branchBase,
      modeEffective: settings.modeEffective,
      reason: triage.reason || "running",
      resolved: false,
      roundsCompleted: outcome.rounds.length + 1,
      tasksCompleted: outcome.tasksCompleted + 1,
      maxRounds: settings.maxRounds,
      maxTasks: settings.maxTasks,
      currentRound: round,
      latestWorkingBranch: workingBranch,
      triage,
      packet,
      checkpoint,
      warnings: ctx.warnings,
      errors: ctx.errors,
      maxDraftChars: settings.maxDraftChars,
      maxTraceLines: settings.terminalTraceLines,
    });
    const phone = await writeRoundPhoneStatus({
      layout: ctx.layout,
      roundDir,
      controllerRunId: ctx.controllerRunId,
      round,
      payload: phonePayload,
      markdown: renderPhoneStatusMarkdown(phonePayload),
    });

    if (round % settings.checkpointEvery === 0 || triageExitCode !== 0) {
      await writeInboxPacket({ layout: ctx.layout, controllerRunId: ctx.controllerRunId, packet: checkpoint });
    }
    outcome.latestPacket = checkpointPath;

    const row: ControllerRound = {
      round,
      workingBranch,
      loopBranch,
      triageExitCode,
      packetExitCode,
      triageReason: triage.reason,
      unresolvedCount: triage.unresolvedCount,
      risk: packetRisk(packet, triage),
      packetPath: checkpointPath,
      phoneStatusJson: phone.json,
      requiresApproval: checkpoint.requiresApproval,
    };
    outcome.rounds.push(row);
    outcome.tasksCompleted += 1;
    await ctx.eventLog.append({
      correlationId: ctx.controllerRunId,
      actor: ctx.actor,
      eventType: "controller_round",
      summary: `round ${round}: ${triage.reason} (unresolved=${triage.unresolvedCount}, risk=${row.risk})`,
      evidence: { ...row, idempotencyKey: checkpoint.idempotencyKey },
    });

    const stop = roundStopReason(row);
    if (stop) {
      if (stop !== "resolved") {
        ctx.errors.push(stopMessage(row, stop));
      }
      outcome.reason = stop;
      outcome.resolved = stop === "resolved";
      break;
    }
  }
  return outcome;
}

/** Stop checks in priority order: integrity violations, broken commands, then resolution. */
export function roundStopReason(row: ControllerRound): ControllerReason | null {
  if (isHardReasonCode(row.triageReason)) {
    return row.triageReason;
  }
  if (row.triageExitCode !== 0 && row.triageExitCode !== 1) {
    return "triage_loop_failed";
  }
  if (row.packetExitCode !== 0 && row.packetExitCode !== 1) {
    return "loop_packet_failed";
  }
  if (row.unresolvedCount <= 0 && row.triageReason === "resolved") {
    return "resolved";
  }
  return null;
}

function stopMessage(row: ControllerRound, reason: ControllerReason) {
  switch (reason) {
    case "triage_loop_failed":
      return `round ${row.round}: triage-loop exited ${row.triageExitCode}`;
    case "loop_packet_failed":
      return `round ${row.round}: loop-packet exited ${row.packetExitCode}`;
    default:
      return `round ${row.round}: hard stop reason from triage-loop (${reason})`;
  }
}
