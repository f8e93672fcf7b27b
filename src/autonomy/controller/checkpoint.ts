import { createHash, randomBytes } from "node:crypto";
import { isoTimestamp } from "../../infra/clock.js";
import type { CheckpointPacket } from "../types.js";
import { packetRisk, type PacketSnapshot, type TriageSnapshot } from "./reports.js";

export function computeIdempotencyKey(parts: {
  planId: string;
  controllerRunId: string;
  round: number;
  sourceTimestamp: string;
  summary: string;
}) {
  const seed = [parts.planId, parts.controllerRunId, String(parts.round), parts.sourceTimestamp, parts.summary].join(
    "|",
  );
  return createHash("sha256").update(seed).digest("hex").slice(0, 24);
}

export function generateNonce() {
  return randomBytes(12).toString("hex");
}

/** One line per attempt plus its note; a report without attempts yields its reason. */
export function terminalTrace(triage: TriageSnapshot, maxLines: number) {
  if (maxLines <= 0) {
    return [];
  }
  const lines: string[] = [];
  for (const attempt of triage.attempts) {
    lines.push(
      [
        `attempt=${attempt.attempt}`,
        `run_id=${attempt.runId}`,
        `sha=${attempt.runSha || "n/a"}`,
        `conclusion=${attempt.runConclusion || "n/a"}`,
        `backlog=${attempt.backlogCount ?? "n/a"}`,
        `status=${attempt.status}`,
      ].join(" "),
    );
    const note = attempt.message?.trim();
    if (note) {
      lines.push(`note=${note}`);
    }
  }
  if (lines.length === 0) {
    lines.push(`reason=${triage.reason}`);
  }
  return lines.slice(0, maxLines);
}

export function buildCheckpointPacket(params: {
  planId: string;
  controllerRunId: string;
  branchBase: string;
  workingBranch: string;
  round: number;
  triage: TriageSnapshot;
  packet: PacketSnapshot;
  replayWindowSeconds: number;
  traceLines: number;
  evidenceRefs: string[];
  now: number;
  nonce: string;
}): CheckpointPacket {
  const { triage, packet } = params;
  const risk = packetRisk(packet, triage);
  return {
    schemaVersion: 1,
    planId: params.planId,
    controllerRunId: params.controllerRunId,
    round: params.round,
    timestampUtc: isoTimestamp(params.now),
    source: "triage-loop",
    workingBranch: params.workingBranch,
    promotionBranch: params.branchBase,
    risk,
    requiresApproval: risk === "high" || triage.mode !== "report-only" || triage.unresolvedCount > 0,
    draftText: packet.terminalPacket?.draftText.trim() ?? "",
    terminalPacket: packet.terminalPacket,
    proposedActions: [...packet.nextActions],
    evidenceRefs: [...params.evidenceRefs],
    idempotencyKey: computeIdempotencyKey({
      planId: params.planId,
      controllerRunId: params.controllerRunId,
      round: params.round,
      sourceTimestamp: triage.timestamp,
      summary: packet.summary,
    }),
    nonce: params.nonce,
    expiresAtUtc: isoTimestamp(params.now + Math.max(1, params.replayWindowSeconds) * 1000),
    status: "pending",
    reasonCode: triage.reason,
    unresolvedCount: triage.unresolvedCount,
    terminalTrace: terminalTrace(triage, params.traceLines),
  };
}

export type CheckpointAcceptance =
  | { ok: true }
  | { ok: false; reason: "expired" | "duplicate" | "not_pending" | "invalid_expiry" };

/**
 * Replay check for downstream consumers. A packet is accepted at most once per `seenKeys`
 * set; the key is recorded on acceptance.
 */
export function acceptCheckpointPacket(
  packet: Pick<CheckpointPacket, "status" | "expiresAtUtc" | "idempotencyKey">,
  now: number,
  seenKeys?: Set<string>,
): CheckpointAcceptance {
  if (packet.status !== "pending") {
    return { ok: false, reason: "not_pending" };
  }
  const expiresAt = Date.parse(packet.expiresAtUtc);
  if (Number.isNaN(expiresAt)) {
    return { ok: false, reason: "invalid_expiry" };
  }
  if (now > expiresAt) {
    return { ok: false, reason: "expired" };
  }
  if (seenKeys?.has(packet.idempotencyKey)) {
    return { ok: false, reason: "duplicate" };
  }
  seenKeys?.add(packet.idempotencyKey);
  return { ok: true };
}
