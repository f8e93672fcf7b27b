import { describe, expect, it } from "vitest";
import type { PacketSnapshot, TriageSnapshot } from "../controller/reports.js";
import { buildPhoneStatus, normalizeTraceLines, renderPhoneStatusMarkdown, resolvePhonePhase, type PhoneStatusInput } from "./status.js";

const triage: TriageSnapshot = {
  timestamp: "2026-04-10T08:00:00.000Z",
  mode: "report-only",
  reason: "no fix command configured",
  unresolvedCount: 3,
  attempts: [
    {
      attempt: 1,
      runId: 41,
      runSha: "abc",
      runUrl: "https://ci.example.test/runs/41",
      runConclusion: "success",
      status: "blocked",
      message: "backlog has 3 item(s)",
      backlogCount: 3,
    },
  ],
};

const packet: PacketSnapshot = {
  ok: true,
  reason: "packet_ready",
  risk: null,
  summary: "",
  nextActions: ["one", "two", "three", "four", "five", "six"],
  terminalPacket: { packetId: "p1", sourceCommand: "triage-loop", draftText: "  draft body  ", autoSend: true },
};

function input(overrides: Partial<PhoneStatusInput> = {}): PhoneStatusInput {
  return {
    now: Date.UTC(2026, 3, 10, 8, 30, 0),
    planId: "nightly",
    controllerRunId: "0123456789ab",
    repo: "acme/widgets",
    branchBase: "develop",
    modeEffective: "report-only",
    reason: "no fix command configured",
    resolved: false,
    roundsCompleted: 1,
    tasksCompleted: 1,
    maxRounds: 3,
    maxTasks: 10,
    currentRound: 1,
    latestWorkingBranch: null,
    triage,
    packet,
    checkpoint: null,
    warnings: [],
    errors: [],
    maxDraftChars: 400,
    maxTraceLines: 5,
    ...overrides,
  };
}

describe("resolvePhonePhase", () => {
  it("orders error, resolved, paused, running", () => {
    expect(resolvePhonePhase({ errors: ["x"], resolved: true, reason: "resolved" })).toBe("error");
    expect(resolvePhonePhase({ errors: [], resolved: true, reason: "resolved" })).toBe("resolved");
    expect(resolvePhonePhase({ errors: [], resolved: false, reason: "max_tasks_reached" })).toBe("paused");
    expect(resolvePhonePhase({ errors: [], resolved: false, reason: "blocked" })).toBe("running");
  });
});

describe("normalizeTraceLines", () => {
  it("drops blanks, caps the count and truncates long lines", () => {
    const lines = normalizeTraceLines([" a ", "", "b".repeat(300), "c"], 2);
    expect(lines).toEqual(["a", `${"b".repeat(217)}...`]);
    expect(normalizeTraceLines(["a"], 0)).toEqual([]);
  });
});

describe("buildPhoneStatus", () => {
  it("reduces controller state to a phone snapshot", () => {
    const payload = buildPhoneStatus(input());
    expect(payload.timestamp).toBe("2026-04-10T08:30:00.000Z");
    expect(payload.phase).toBe("running");
    expect(payload.loop).toEqual({
      triageReason: "no fix command configured",
      unresolvedCount: 3,
      risk: "medium",
      nextActions: ["one", "two", "three", "four", "five"],
    });
    expect(payload.terminal).toEqual({ trace: [], draftText: "draft body", autoSend: true });
    expect(payload.sourceRun).toEqual({
      runId: 41,
      runSha: "abc",
      runUrl: "https://ci.example.test/runs/41",
      runConclusion: "success",
      attemptStatus: "blocked",
      attemptMessage: "backlog has 3 item(s)",
    });
  });

  it("renders markdown with placeholders for missing data", () => {
    const lines = renderPhoneStatusMarkdown(buildPhoneStatus(input({ triage: null, packet: null }))).split("\n");
    expect(lines[0]).toBe("# autoloop phone status");
    expect(lines).toContain("- source_run_id: n/a");
    expect(lines).toContain("- risk: low");
    expect(lines).toContain("(none)");
    expect(lines.at(-1)).toBe("- none");
  });
});
