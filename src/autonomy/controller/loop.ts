import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import type { RuntimeConfig } from "../../config/runtime-config.js";
import { isoTimestamp, type Clock } from "../../infra/clock.js";
import { InputValidationError } from "../../infra/errors.js";
import { writeJsonAtomic, writeTextAtomic } from "../../infra/json-file.js";
import { silentLogger, type AutonomyLogger } from "../../logging/subsystem.js";
import { noopEventLog, type EventLogWriter } from "../ledger/store.js";
import { MIN_DRAFT_CHARS } from "../packet/builder.js";
import { buildPhoneStatus, renderPhoneStatusMarkdown } from "../phone/status.js";
import { evaluateControllerCaps, isBranchAllowed } from "../policy/runtime.js";
import type { ControlPlanePolicy } from "../policy/types.js";
import type {
  CommentTarget,
  ControllerReason,
  ControllerReport,
  LoopBranchMode,
  LoopMode,
  NotifyMode,
} from "../types.js";
import { generateNonce } from "./checkpoint.js";
import { ensureQueueLayout, resolveQueueLayout, writeFinalPhoneStatus } from "./queue.js";
import { runControllerRounds, type RoundRunners, type RoundSettings } from "./rounds.js";

export const DEFAULT_PACKET_OUT = "dev/reports/autonomy/packets";
export const DEFAULT_QUEUE_OUT = "dev/reports/autonomy/queue";

const CLEAN_REASONS: ReadonlySet<ControllerReason> = new Set([
  "resolved",
  "max_rounds_reached",
  "max_hours_reached",
  "max_tasks_reached",
]);

export type AutonomyLoopOptions = {
  repo?: string;
  planId: string;
  branchBase: string;
  workingBranchPrefix: string;
  workflow: string;
  mode: LoopMode;
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
  packetOut: string;
  queueOut: string;
  maxPacketAgeHours: number;
  maxDraftChars: number;
  allowAutoSend: boolean;
  terminalTraceLines: number;
  dryRun: boolean;
};

export type AutonomyLoopDeps = {
  config: RuntimeConfig;
  policy: ControlPlanePolicy;
  clock: Clock;
  runners: RoundRunners;
  logger?: AutonomyLogger;
  eventLog?: EventLogWriter;
  nonce?: () => string;
};

export type AutonomyLoopResult = { exitCode: number; report: ControllerReport };

/** Keeps `[A-Za-z0-9._-]`, collapses everything else to `-`, trims separators, caps at 80 chars. */
export function slugify(value: string, fallback: string) {
  const normalized = value
    .trim()
    .replace(/[^a-zA-Z0-9._-]+/g, "-")
    .replace(/^[-._]+|[-._]+$/g, "");
  return (normalized || fallback).slice(0, 80);
}

export function validateAutonomyLoopOptions(options: AutonomyLoopOptions, config: RuntimeConfig) {
  const repo = options.repo?.trim() || config.repo;
  if (!repo) {
    throw new InputValidationError(
      "unable to resolve repository (pass --repo or set GITHUB_REPOSITORY)",
    );
  }
  const checks: [boolean, string][] = [
    [options.maxRounds >= 1, "--max-rounds must be >= 1"],
    [options.maxHours > 0, "--max-hours must be > 0"],
    [options.maxTasks >= 1, "--max-tasks must be >= 1"],
    [options.checkpointEvery >= 1, "--checkpoint-every must be >= 1"],
    [options.loopMaxAttempts >= 1, "--loop-max-attempts must be >= 1"],
    [options.pollSeconds >= 5, "--poll-seconds must be >= 5"],
    [options.timeoutSeconds >= 60, "--timeout-seconds must be >= 60"],
    [options.maxPacketAgeHours > 0, "--max-packet-age-hours must be > 0"],
    [options.maxDraftChars >= MIN_DRAFT_CHARS, `--max-draft-chars must be >= ${MIN_DRAFT_CHARS}`],
    [options.terminalTraceLines >= 1, "--terminal-trace-lines must be >= 1"],
  ];
  for (const [ok, message] of checks) {
    if (!ok) {
      throw new InputValidationError(message);
    }
  }
  return repo;
}

export function computeControllerRunId(parts: { now: number; planId: string; repo: string; branchBase: string }) {
  const seed = [isoTimestamp(parts.now), parts.planId, parts.repo, parts.branchBase].join("|");
  return createHash("sha256").update(seed).digest("hex").slice(0, 12);
}

function emptyReport(base: {
  timestamp: string;
  planId: string;
  repo: string;
  options: AutonomyLoopOptions;
  modeEffective: LoopMode;
  packetRoot: string;
  queueRoot: string;
  warnings: string[];
  errors: string[];
}): ControllerReport {
  const { options } = base;
  return {
    command: "autonomy-loop",
    timestamp: base.timestamp,
    ok: false,
    resolved: false,
    reason: "policy_denied",
    planId: base.planId,
    controllerRunId: null,
    repo: base.repo,
    branchBase: options.branchBase.trim(),
    modeRequested: options.mode,
    modeEffective: base.modeEffective,
    loopBranchMode: options.loopBranchMode,
    maxRounds: options.maxRounds,
    maxHours: options.maxHours,
    maxTasks: options.maxTasks,
    roundsCompleted: 0,
    tasksCompleted: 0,
    elapsedHours: 0,
    packetRoot: base.packetRoot,
    queueRoot: base.queueRoot,
    latestPacket: null,
    latestWorkingBranch: null,
    phoneStatusLatestJson: null,
    phoneStatusLatestMd: null,
    phoneStatusFinalJson: null,
    phoneStatusFinalMd: null,
    summaryJson: null,
    summaryMd: null,
    warnings: base.warnings,
    errors: base.errors,
    rounds: [],
  };
}

/**
 * Bounded controller: gates the request against policy, then runs rounds until the backlog
 * resolves, a budget runs out, or a round reports an integrity violation. A denied request
 * writes nothing under the packet or queue roots.
 */
export async function runAutonomyLoop(
  options: AutonomyLoopOptions,
  deps: AutonomyLoopDeps,
): Promise<AutonomyLoopResult> {
  const logger = deps.logger ?? silentLogger;
  const eventLog = deps.eventLog ?? noopEventLog;
  const { config, policy } = deps;
  const repo = validateAutonomyLoopOptions(options, config);

  const planId = slugify(options.planId, "plan");
  const branchBase = options.branchBase.trim();
  const workingBranchPrefix = slugify(options.workingBranchPrefix, "autoloop");
  const warnings: string[] = [];
  const errors: string[] = [];

  if (!isBranchAllowed(policy, branchBase)) {
    errors.push(`branch '${branchBase}' is not allowed by allowed_branches policy`);
  }
  errors.push(...evaluateControllerCaps(policy, options));

  let modeEffective = options.mode;
  if (options.mode !== "report-only" && config.autonomyMode !== "operate") {
    warnings.push("AUTONOMY_MODE is not 'operate'; forced controller mode to report-only for safety");
    modeEffective = "report-only";
  }

  const packetRoot = path.resolve(config.repoRoot, policy.packetRoot ?? options.packetOut);
  const queueRoot = path.resolve(config.repoRoot, policy.queueRoot ?? options.queueOut);

  if (errors.length > 0) {
    const report = emptyReport({
      timestamp: isoTimestamp(deps.clock.now()),
      planId,
      repo,
      options,
      modeEffective,
      packetRoot,
      queueRoot,
      warnings,
      errors,
    });
    logger.warn(`autonomy-loop denied by policy: ${errors.join("; ")}`);
    await eventLog.append({
      correlationId: planId,
      actor: config.actor,
      eventType: "policy_denied",
      summary: `autonomy-loop denied for ${repo}@${branchBase}`,
      evidence: { errors },
    });
    return { exitCode: 1, report };
  }

  const startedAt = deps.clock.now();
  const controllerRunId = computeControllerRunId({ now: startedAt, planId, repo, branchBase });
  const runPacketRoot = path.join(packetRoot, controllerRunId);
  const layout = resolveQueueLayout(queueRoot);
  await fs.mkdir(runPacketRoot, { recursive: true });
  await ensureQueueLayout(layout);
  await eventLog.append({
    correlationId: controllerRunId,
    actor: config.actor,
    eventType: "controller_started",
    summary: `autonomy-loop ${planId} started on ${repo}@${branchBase} (mode=${modeEffective})`,
    evidence: { planId, maxRounds: options.maxRounds, maxHours: options.maxHours, maxTasks: options.maxTasks },
  });

  const settings: RoundSettings = {
    repo,
    planId,
    branchBase,
    workingBranchPrefix,
    workflow: options.workflow,
    modeEffective,
    loopBranchMode: options.loopBranchMode,
    fixCommand: options.fixCommand?.trim() || undefined,
    maxRounds: options.maxRounds,
    maxHours: options.maxHours,
    maxTasks: options.maxTasks,
    checkpointEvery: options.checkpointEvery,
    loopMaxAttempts: options.loopMaxAttempts,
    runListLimit: options.runListLimit,
    pollSeconds: options.pollSeconds,
    timeoutSeconds: options.timeoutSeconds,
    notify: options.notify,
    commentTarget: options.commentTarget,
    commentPrNumber: options.commentPrNumber,
    maxPacketAgeHours: options.maxPacketAgeHours,
    maxDraftChars: options.maxDraftChars,
    allowAutoSend: options.allowAutoSend,
    terminalTraceLines: options.terminalTraceLines,
    dryRun: options.dryRun,
    replayWindowSeconds: policy.replayWindowSeconds,
  };

  const outcome = await runControllerRounds({
    settings,
    controllerRunId,
    runPacketRoot,
    layout,
    runners: deps.runners,
    clock: deps.clock,
    logger,
    eventLog,
    actor: config.actor,
    nonce: deps.nonce ?? generateNonce,
    warnings,
    errors,
  });

  const finishedAt = deps.clock.now();
  const ok = errors.length === 0 && CLEAN_REASONS.has(outcome.reason);
  const finalPhone = buildPhoneStatus({
    now: finishedAt,
    planId,
    controllerRunId,
    repo,
    branchBase,
    modeEffective,
    reason: outcome.reason,
    resolved: outcome.resolved,
    roundsCompleted: outcome.rounds.length,
    tasksCompleted: outcome.tasksCompleted,
    maxRounds: options.maxRounds,
    maxTasks: options.maxTasks,
    currentRound: outcome.rounds.length,
    latestWorkingBranch: outcome.latestWorkingBranch,
    triage: outcome.lastTriage,
    packet: outcome.lastPacket,
    checkpoint: outcome.lastCheckpoint,
    warnings,
    errors,
    maxDraftChars: options.maxDraftChars,
    maxTraceLines: options.terminalTraceLines,
  });
  const finalPaths = await writeFinalPhoneStatus({
    layout,
    controllerRunId,
    payload: finalPhone,
    markdown: renderPhoneStatusMarkdown(finalPhone),
  });

  const report: ControllerReport = {
    command: "autonomy-loop",
    timestamp: isoTimestamp(finishedAt),
    ok,
    resolved: outcome.resolved,
    reason: outcome.reason,
    planId,
    controllerRunId,
    repo,
    branchBase,
    modeRequested: options.mode,
    modeEffective,
    loopBranchMode: options.loopBranchMode,
    maxRounds: options.maxRounds,
    maxHours: options.maxHours,
    maxTasks: options.maxTasks,
    roundsCompleted: outcome.rounds.length,
    tasksCompleted: outcome.tasksCompleted,
    elapsedHours: Math.round((Math.max(0, finishedAt - outcome.startedAt) / 3_600_000) * 1000) / 1000,
    packetRoot: runPacketRoot,
    queueRoot,
    latestPacket: outcome.latestPacket,
    latestWorkingBranch: outcome.latestWorkingBranch,
    phoneStatusLatestJson: layout.phoneLatestJson,
    phoneStatusLatestMd: layout.phoneLatestMd,
    phoneStatusFinalJson: finalPaths.json,
    phoneStatusFinalMd: finalPaths.md,
    summaryJson: path.join(runPacketRoot, "controller-summary.json"),
    summaryMd: path.join(runPacketRoot, "controller-summary.md"),
    warnings,
    errors,
    rounds: outcome.rounds,
  };
  await writeJsonAtomic(path.join(runPacketRoot, "controller-summary.json"), report);
  await writeTextAtomic(path.join(runPacketRoot, "controller-summary.md"), `${renderControllerMarkdown(report)}\n`);

  await eventLog.append({
    correlationId: controllerRunId,
    actor: config.actor,
    eventType: "controller_finished",
    summary: `autonomy-loop ${planId} finished: ${report.reason} after ${report.roundsCompleted} round(s)`,
    evidence: { ok, resolved: report.resolved, reason: report.reason, errors },
  });
  logger.info(`autonomy-loop finished: ${report.reason} (rounds=${report.roundsCompleted})`);
  return { exitCode: ok ? 0 : 1, report };
}

export function renderControllerMarkdown(report: ControllerReport) {
  const lines = ["# autoloop autonomy-loop", ""];
  lines.push(`- ok: ${report.ok}`);
  lines.push(`- resolved: ${report.resolved}`);
  lines.push(`- plan_id: ${report.planId}`);
  lines.push(`- controller_run_id: ${report.controllerRunId ?? "n/a"}`);
  lines.push(`- repo: ${report.repo}`);
  lines.push(`- branch_base: ${report.branchBase}`);
  lines.push(`- mode_requested: ${report.modeRequested}`);
  lines.push(`- mode_effective: ${report.modeEffective}`);
  lines.push(`- rounds_completed: ${report.roundsCompleted}`);
  lines.push(`- tasks_completed: ${report.tasksCompleted}`);
  lines.push(`- reason: ${report.reason}`);
  lines.push(`- packet_root: ${report.packetRoot}`);
  lines.push(`- queue_root: ${report.queueRoot}`);
  lines.push(`- latest_packet: ${report.latestPacket ?? "n/a"}`);
  lines.push(`- phone_status_latest_json: ${report.phoneStatusLatestJson ?? "n/a"}`);
  lines.push(`- phone_status_latest_md: ${report.phoneStatusLatestMd ?? "n/a"}`);
  lines.push(`- latest_working_branch: ${report.latestWorkingBranch ?? "n/a"}`);
  if (report.warnings.length > 0) {
    lines.push(`- warnings: ${report.warnings.join(" | ")}`);
  }
  if (report.errors.length > 0) {
    lines.push(`- errors: ${report.errors.join(" | ")}`);
  }
  lines.push("", "## Rounds", "");
  if (report.rounds.length === 0) {
    lines.push("- none");
  }
  for (const row of report.rounds) {
    lines.push(
      `- r${row.round} branch=${row.workingBranch} unresolved=${row.unresolvedCount} risk=${row.risk} reason=${row.triageReason}`,
    );
    lines.push(`  packet: ${row.packetPath}`);
  }
  return lines.join("\n");
}
