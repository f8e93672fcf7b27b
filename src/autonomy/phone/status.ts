import { isoTimestamp } from "../../infra/clock.js";
import { truncateChars } from "../packet/risk.js";
import { packetRisk, type PacketSnapshot, type TriageSnapshot } from "../controller/reports.js";
import type { CheckpointPacket, LoopMode, PhonePhase, PhoneStatusPayload } from "../types.js";

export const TRACE_LINE_MAX_CHARS = 220;
const MAX_PHONE_ACTIONS = 5;

const PAUSED_REASONS: ReadonlySet<string> = new Set([
  "max_rounds_reached",
  "max_tasks_reached",
  "max_hours_reached",
]);

export function resolvePhonePhase(params: { errors: readonly string[]; resolved: boolean; reason: string }): PhonePhase {
  if (params.errors.length > 0) {
    return "error";
  }
  if (params.resolved) {
    return "resolved";
  }
  return PAUSED_REASONS.has(params.reason) ? "paused" : "running";
}

export function normalizeTraceLines(lines: readonly string[], maxLines: number) {
  if (maxLines <= 0) {
    return [];
  }
  return lines
    .map((line) => line.trim())
    .filter(Boolean)
    .slice(0, maxLines)
    .map((line) => truncateChars(line, TRACE_LINE_MAX_CHARS));
}

export type PhoneStatusInput = {
  now: number;
  planId: string;
  controllerRunId: string;
  repo: string;
  branchBase: string;
  modeEffective: LoopMode;
  reason: string;
  resolved: boolean;
  roundsCompleted: number;
  tasksCompleted: number;
  maxRounds: number;
  maxTasks: number;
  currentRound: number;
  latestWorkingBranch: string | null;
  triage: TriageSnapshot | null;
  packet: PacketSnapshot | null;
  checkpoint: CheckpointPacket | null;
  warnings: readonly string[];
  errors: readonly string[];
  maxDraftChars: number;
  maxTraceLines: number;
};

/** Reduces controller state and the latest round's reports to a phone-sized snapshot. */
export function buildPhoneStatus(input: PhoneStatusInput): PhoneStatusPayload {
  const attempt = input.triage?.attempts.at(-1);
  const draftSource = input.packet?.terminalPacket?.draftText || input.checkpoint?.draftText || "";
  return {
    schemaVersion: 1,
    command: "phone-status",
    timestamp: isoTimestamp(input.now),
    ok: input.errors.length === 0,
    phase: resolvePhonePhase(input),
    reason: input.reason,
    controller: {
      planId: input.planId,
      controllerRunId: input.controllerRunId,
      repo: input.repo,
      branchBase: input.branchBase,
      modeEffective: input.modeEffective,
      resolved: input.resolved,
      roundsCompleted: input.roundsCompleted,
      tasksCompleted: input.tasksCompleted,
      maxRounds: input.maxRounds,
      maxTasks: input.maxTasks,
      currentRound: input.currentRound,
      latestWorkingBranch: input.latestWorkingBranch,
    },
    loop: {
      triageReason: input.triage?.reason ?? "unknown",
      unresolvedCount: input.triage?.unresolvedCount ?? 0,
      risk: packetRisk(input.packet, input.triage),
      nextActions: (input.packet?.nextActions ?? []).slice(0, MAX_PHONE_ACTIONS),
    },
    terminal: {
      trace: normalizeTraceLines(input.checkpoint?.terminalTrace ?? [], input.maxTraceLines),
      draftText: truncateChars(draftSource.trim(), input.maxDraftChars),
      autoSend: input.packet?.terminalPacket?.autoSend ?? false,
    },
    sourceRun: {
      runId: attempt?.runId ?? null,
      runSha: attempt?.runSha || null,
      runUrl: attempt?.runUrl || null,
      runConclusion: attempt?.runConclusion || null,
      attemptStatus: attempt?.status ?? null,
      attemptMessage: attempt?.message ?? null,
    },
    warnings: [...input.warnings],
    errors: [...input.errors],
  };
}

export function renderPhoneStatusMarkdown(payload: PhoneStatusPayload) {
  const { controller, loop, terminal, sourceRun } = payload;
  const lines = ["# autoloop phone status", ""];
  lines.push(`- phase: ${payload.phase}`);
  lines.push(`- reason: ${payload.reason}`);
  lines.push(`- plan_id: ${controller.planId}`);
  lines.push(`- run_id: ${controller.controllerRunId}`);
  lines.push(`- branch_base: ${controller.branchBase}`);
  lines.push(`- mode: ${controller.modeEffective}`);
  lines.push(`- resolved: ${controller.resolved}`);
  lines.push(
    `- progress: rounds ${controller.roundsCompleted}/${controller.maxRounds} | tasks ${controller.tasksCompleted}/${controller.maxTasks}`,
  );
  lines.push(`- working_branch: ${controller.latestWorkingBranch ?? "n/a"}`);
  lines.push(`- unresolved_count: ${loop.unresolvedCount}`);
  lines.push(`- risk: ${loop.risk}`);
  lines.push(`- triage_reason: ${loop.triageReason}`);
  lines.push(`- source_run_id: ${sourceRun.runId ?? "n/a"}`);
  lines.push(`- source_run_sha: ${sourceRun.runSha ?? "n/a"}`);
  lines.push(`- source_run_url: ${sourceRun.runUrl ?? "n/a"}`);
  lines.push("", "## Terminal Trace", "");
  lines.push(...(terminal.trace.length > 0 ? terminal.trace.map((row) => `- ${row}`) : ["- none"]));
  lines.push("", "## Draft", "");
  lines.push(terminal.draftText.trim() || "(none)");
  lines.push("", "## Next Actions", "");
  lines.push(...(loop.nextActions.length > 0 ? loop.nextActions.map((row) => `- ${row}`) : ["- none"]));
  return lines.join("\n");
}
