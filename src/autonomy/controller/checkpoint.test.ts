import { describe, expect, it } from "vitest";
import { acceptCheckpointPacket, buildCheckpointPacket, computeIdempotencyKey, terminalTrace } from "./checkpoint.js";
import type { PacketSnapshot, TriageSnapshot } from "./reports.js";

const NOW = Date.UTC(2026, 2, 1, 12, 0, 0);

function triage(overrides: Partial<TriageSnapshot> = {}): TriageSnapshot {
  return {
    timestamp: "2026-03-01T11:59:00.000Z",
    mode: "report-only",
    reason: "no fix command configured",
    unresolvedCount: 2,
    attempts: [
      {
        attempt: 1,
        runId: 7,
        runSha: "abc123",
        runUrl: "https://ci.example.test/runs/7",
        runConclusion: "success",
        status: "blocked",
        message: "backlog has 2 item(s)",
        backlogCount: 2,
      },
    ],
    ...overrides,
  };
}

function packet(overrides: Partial<PacketSnapshot> = {}): PacketSnapshot {
  return {
    ok: true,
    reason: "packet_ready",
    risk: "medium",
    summary: "packet 0123 ready from triage-loop (risk=medium, auto_send=no)",
    nextActions: ["rerun triage"],
    terminalPacket: {
      packetId: "0123",
      sourceCommand: "triage-loop",
      draftText: "Loop feedback packet:\n- unresolved=2\n",
      autoSend: false,
    },
    ...overrides,
  };
}

function checkpoint(overrides: { replayWindowSeconds?: number; triage?: TriageSnapshot } = {}) {
  return buildCheckpointPacket({
    planId: "plan-a",
    controllerRunId: "run123",
    branchBase: "develop",
    workingBranch: "autoloop/plan-a/run123/r001",
    round: 1,
    triage: overrides.triage ?? triage(),
    packet: packet(),
    replayWindowSeconds: overrides.replayWindowSeconds ?? 300,
    traceLines: 10,
    evidenceRefs: ["round-001/triage-loop.json"],
    now: NOW,
    nonce: "nonce-1",
  });
}

describe("computeIdempotencyKey", () => {
  const parts = {
    planId: "plan-a",
    controllerRunId: "run123",
    round: 1,
    sourceTimestamp: "2026-03-01T11:59:00.000Z",
    summary: "s",
  };

  it("is deterministic and 24 hex chars", () => {
    const key = computeIdempotencyKey(parts);
    expect(key).toMatch(/^[0-9a-f]{24}$/);
    expect(computeIdempotencyKey({ ...parts })).toBe(key);
  });

  it("changes when any single input changes", () => {
    const key = computeIdempotencyKey(parts);
    const variants = [
      { ...parts, planId: "plan-b" },
      { ...parts, controllerRunId: "run124" },
      { ...parts, round: 2 },
      { ...parts, sourceTimestamp: "2026-03-01T11:59:01.000Z" },
      { ...parts, summary: "t" },
    ];
    const keys = variants.map((variant) => computeIdempotencyKey(variant));
    for (const variantKey of keys) {
      expect(variantKey).not.toBe(key);
    }
    expect(new Set(keys).size).toBe(variants.length);
  });
});

describe("terminalTrace", () => {
  it("renders one line per attempt plus its note", () => {
    expect(terminalTrace(triage(), 10)).toEqual([
      "attempt=1 run_id=7 sha=abc123 conclusion=success backlog=2 status=blocked",
      "note=backlog has 2 item(s)",
    ]);
  });

  it("falls back to the reason and honors the line cap", () => {
    expect(terminalTrace(triage({ attempts: [] }), 5)).toEqual(["reason=no fix command configured"]);
    expect(terminalTrace(triage(), 1)).toHaveLength(1);
    expect(terminalTrace(triage(), 0)).toEqual([]);
  });
});

describe("buildCheckpointPacket", () => {
  it("carries the draft, expiry window and approval flag", () => {
    const packetValue = checkpoint();
    expect(packetValue).toMatchObject({
      schemaVersion: 1,
      round: 1,
      timestampUtc: "2026-03-01T12:00:00.000Z",
      expiresAtUtc: "2026-03-01T12:05:00.000Z",
      promotionBranch: "develop",
      risk: "medium",
      requiresApproval: true,
      draftText: "Loop feedback packet:\n- unresolved=2",
      proposedActions: ["rerun triage"],
      status: "pending",
      reasonCode: "no fix command configured",
      nonce: "nonce-1",
    });
  });

  it("needs no approval for a resolved report-only round", () => {
    const packetValue = checkpoint({ triage: triage({ reason: "resolved", unresolvedCount: 0 }) });
    expect(packetValue.requiresApproval).toBe(false);
  });
});

describe("acceptCheckpointPacket", () => {
  it("accepts once and rejects the replay", () => {
    const packetValue = checkpoint();
    const seen = new Set<string>();
    expect(acceptCheckpointPacket(packetValue, NOW + 1000, seen)).toEqual({ ok: true });
    expect(acceptCheckpointPacket(packetValue, NOW + 2000, seen)).toEqual({ ok: false, reason: "duplicate" });
  });

  it("rejects expired and non-pending packets", () => {
    const packetValue = checkpoint({ replayWindowSeconds: 60 });
    expect(acceptCheckpointPacket(packetValue, NOW + 61_000)).toEqual({ ok: false, reason: "expired" });
    expect(acceptCheckpointPacket({ ...packetValue, status: "accepted" }, NOW)).toEqual({
      ok: false,
      reason: "not_pending",
    });
    expect(acceptCheckpointPacket({ ...packetValue, expiresAtUtc: "soon" }, NOW)).toEqual({
      ok: false,
      reason: "invalid_expiry",
    });
  });
});
