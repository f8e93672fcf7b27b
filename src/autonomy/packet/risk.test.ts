import { describe, expect, it } from "vitest";
import { buildPacketDraft } from "./draft.js";
import { classifyRisk, classifyTriageLoopRisk, isAutoSendEligible, truncateChars } from "./risk.js";
import type { SourceBody } from "./sources.js";

describe("packet risk", () => {
  it("classifies triage-loop backlog sizes with fixed thresholds", () => {
    expect(classifyTriageLoopRisk(0)).toBe("low");
    expect(classifyTriageLoopRisk(4)).toBe("medium");
    expect(classifyTriageLoopRisk(8)).toBe("medium");
    expect(classifyTriageLoopRisk(9)).toBe("high");
  });

  it("flags mutation scores below threshold as high", () => {
    const body: SourceBody = {
      kind: "mutation-loop",
      lastScore: 0.6,
      threshold: 0.8,
      reason: "report_only_below_threshold",
      branch: "develop",
      hotspots: [],
    };
    expect(classifyRisk(body)).toBe("high");
    expect(classifyRisk({ ...body, lastScore: 0.85 })).toBe("low");
    expect(classifyRisk({ ...body, lastScore: null })).toBe("low");
  });

  it("classifies triage rollups by the worst severity present", () => {
    const body: SourceBody = { kind: "triage", total: 3, high: 0, medium: 2, nextActions: [] };
    expect(classifyRisk(body)).toBe("medium");
    expect(classifyRisk({ ...body, high: 1 })).toBe("high");
    expect(classifyRisk({ ...body, medium: 0 })).toBe("low");
  });

  it("never auto-sends when the caller did not allow it", () => {
    const body: SourceBody = {
      kind: "triage-loop",
      unresolvedCount: 0,
      reason: "resolved",
      branch: "develop",
      sourceRunId: null,
    };
    expect(isAutoSendEligible({ body, risk: "low", allowAutoSend: false })).toBe(false);
    expect(isAutoSendEligible({ body, risk: "low", allowAutoSend: true })).toBe(true);
  });

  it("requires a confirmed resolution on top of low risk", () => {
    const body: SourceBody = {
      kind: "triage-loop",
      unresolvedCount: 0,
      reason: "dry-run",
      branch: "develop",
      sourceRunId: null,
    };
    expect(classifyRisk(body)).toBe("low");
    expect(isAutoSendEligible({ body, risk: "low", allowAutoSend: true })).toBe(false);
  });
});

describe("truncateChars", () => {
  it("bounds the length and marks truncation", () => {
    expect(truncateChars("abcdefghij", 8)).toBe("abcde...");
    expect(truncateChars("short", 8)).toBe("short");
    expect(truncateChars("anything", 0)).toBe("");
  });

  it("counts code points and never splits a surrogate pair", () => {
    expect(truncateChars("ab\u{1F600}\u{1F600}", 4)).toBe("ab\u{1F600}\u{1F600}");
    expect(truncateChars("\u{1F600}\u{1F600}\u{1F600}\u{1F600}\u{1F600}", 4)).toBe("\u{1F600}...");
    expect(truncateChars("\u{1F600}\u{1F600}\u{1F600}", 2)).toBe("\u{1F600}\u{1F600}");
  });

  it("is idempotent", () => {
    const source = "x".repeat(500);
    for (const limit of [1, 3, 4, 200, 499, 500]) {
      const once = truncateChars(source, limit);
      expect(once.length).toBeLessThanOrEqual(limit);
      expect(truncateChars(once, limit)).toBe(once);
    }
  });
});

describe("buildPacketDraft", () => {
  it("renders mutation scores as percentages with hotspots", () => {
    const draft = buildPacketDraft({
      kind: "mutation-loop",
      lastScore: 0.62,
      threshold: 0.8,
      reason: "report_only_below_threshold",
      branch: "develop",
      hotspots: [
        { label: "src/parser.ts", missed: 3 },
        { label: "src/lexer.ts", missed: null },
      ],
    });
    expect(draft.lines).toContain("Score `62.00%` vs threshold `80.00%`.");
    expect(draft.nextActions).toEqual([
      "Prioritize mutation hotspots and add focused tests before enabling fix mode.",
      "Top hotspots: src/parser.ts (missed=3), src/lexer.ts",
    ]);
  });

  it("includes the source run id for triage-loop snapshots", () => {
    const draft = buildPacketDraft({
      kind: "triage-loop",
      unresolvedCount: 2,
      reason: "no fix command configured",
      branch: "feature/x",
      sourceRunId: 77,
    });
    expect(draft.lines.join("\n")).toBe(
      [
        "Loop feedback packet:",
        "Loop snapshot for branch `feature/x`.",
        "Reason: `no fix command configured`.",
        "Unresolved medium/high findings: `2`.",
        "Source run id: `77`.",
        "",
        "Task: propose the next bounded remediation step with guardrails and verification.",
      ].join("\n"),
    );
    expect(draft.nextActions).toHaveLength(2);
  });

  it("falls back to a default triage action", () => {
    const draft = buildPacketDraft({ kind: "triage", total: 0, high: 0, medium: 0, nextActions: [] });
    expect(draft.nextActions).toEqual([
      "No explicit next actions found; review triage snapshot and owners.",
    ]);
  });
});
