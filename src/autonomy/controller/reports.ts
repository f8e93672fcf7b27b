import { z } from "zod";
import { readJsonFile } from "../../infra/json-file.js";
import type { RiskLevel, TerminalPacket, TriageAttempt } from "../types.js";

export type AttemptSnapshot = Pick<
  TriageAttempt,
  "attempt" | "runId" | "runSha" | "runUrl" | "runConclusion" | "status" | "message" | "backlogCount"
>;

/** The parts of a persisted triage-loop report the controller acts on. */
export type TriageSnapshot = {
  timestamp: string;
  mode: string;
  reason: string;
  unresolvedCount: number;
  attempts: AttemptSnapshot[];
};

/** The parts of a persisted loop-packet report the controller acts on. */
export type PacketSnapshot = {
  ok: boolean;
  reason: string;
  risk: RiskLevel | null;
  summary: string;
  nextActions: string[];
  terminalPacket: TerminalPacket | null;
};

const riskSchema = z.enum(["low", "medium", "high"]);

const attemptSchema = z.object({
  attempt: z.number().int(),
  runId: z.number().int(),
  runSha: z.string(),
  runUrl: z.string(),
  runConclusion: z.string(),
  status: z.enum(["analyzing-backlog", "resolved", "blocked", "failed", "waiting-for-new-run"]),
  message: z.string().optional(),
  backlogCount: z.number().int().optional(),
});

const triageSnapshotSchema = z.object({
  command: z.literal("triage-loop"),
  timestamp: z.string().default(""),
  mode: z.string().default("report-only"),
  reason: z.string().default("unknown"),
  unresolvedCount: z.number().int().nonnegative().default(0),
  attempts: z.array(attemptSchema).default([]),
});

const terminalPacketSchema = z.object({
  packetId: z.string(),
  sourceCommand: z.enum(["triage-loop", "mutation-loop", "triage"]),
  draftText: z.string(),
  autoSend: z.boolean(),
});

const packetSnapshotSchema = z.object({
  command: z.literal("loop-packet"),
  ok: z.boolean(),
  reason: z.string(),
  risk: riskSchema.optional(),
  summary: z.string().default(""),
  nextActions: z.array(z.string()).default([]),
  terminalPacket: terminalPacketSchema.optional(),
});

export type SnapshotRead<T> = { ok: true; value: T } | { ok: false; error: string };

function describeIssues(error: z.ZodError) {
  return error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
}

export async function readTriageSnapshot(filePath: string): Promise<SnapshotRead<TriageSnapshot>> {
  const loaded = await readJsonFile(filePath);
  if (!loaded.ok) {
    return loaded;
  }
  const parsed = triageSnapshotSchema.safeParse(loaded.value);
  if (!parsed.success) {
    return { ok: false, error: `malformed triage-loop report (${describeIssues(parsed.error)})` };
  }
  const doc = parsed.data;
  return {
    ok: true,
    value: {
      timestamp: doc.timestamp,
      mode: doc.mode,
      reason: doc.reason,
      unresolvedCount: doc.unresolvedCount,
      attempts: doc.attempts,
    },
  };
}

export async function readPacketSnapshot(filePath: string): Promise<SnapshotRead<PacketSnapshot>> {
  const loaded = await readJsonFile(filePath);
  if (!loaded.ok) {
    return loaded;
  }
  const parsed = packetSnapshotSchema.safeParse(loaded.value);
  if (!parsed.success) {
    return { ok: false, error: `malformed loop-packet report (${describeIssues(parsed.error)})` };
  }
  const doc = parsed.data;
  return {
    ok: true,
    value: {
      ok: doc.ok,
      reason: doc.reason,
      risk: doc.risk ?? null,
      summary: doc.summary,
      nextActions: doc.nextActions.map((row) => row.trim()).filter(Boolean),
      terminalPacket: doc.terminalPacket ?? null,
    },
  };
}

/** Risk from the packet when it has one, otherwise derived from the backlog size. */
export function packetRisk(packet: PacketSnapshot | null, triage: TriageSnapshot | null): RiskLevel {
  if (packet?.risk) {
    return packet.risk;
  }
  const unresolved = triage?.unresolvedCount ?? 0;
  if (unresolved <= 0) {
    return "low";
  }
  return unresolved >= 8 ? "high" : "medium";
}
