import { describe, expect, it } from "vitest";
import { makeRun } from "../../test-helpers/fake-workflow-client.js";
import { buildIssueRollup, buildNextActions, classifyIssues, scoreToPercent } from "./triage.js";
import type { ProjectReport } from "./types.js";

const base: ProjectReport = { command: "status", timestamp: "2026-01-01T00:00:00.000Z" };

describe("status triage classification", () => {
  it("classifies failing runs by conclusion", () => {
    const issues = classifyIssues({
      ...base,
      ci: {
        ok: true,
        value: {
          runs: [
            makeRun({ id: 1, conclusion: "failure", displayTitle: "lint" }),
            makeRun({ id: 2, conclusion: "cancelled", displayTitle: "test" }),
            makeRun({ id: 3, conclusion: "success" }),
          ],
        },
      },
    });
    expect(issues).toEqual([
      { category: "ci", severity: "high", source: "status.ci", summary: "lint: completed/failure" },
      { category: "ci", severity: "medium", source: "status.ci", summary: "test: completed/cancelled" },
    ]);
  });

  it("flags an unreachable CI probe as a high infra issue", () => {
    const issues = classifyIssues({ ...base, ci: { ok: false, error: "gh not found" } });
    expect(issues).toEqual([
      { category: "infra", severity: "high", source: "status.ci", summary: "CI fetch failed: gh not found" },
    ]);
  });

  it("scales ratio scores before comparing with the mutation target", () => {
    expect(scoreToPercent(0.75)).toBe(75);
    expect(scoreToPercent(92)).toBe(92);
    const issues = classifyIssues({
      ...base,
      mutants: { ok: true, value: { score: 0.755, outcomesPath: null, outcomesUpdatedAt: null } },
    });
    expect(issues.map((issue) => issue.summary)).toEqual(["Mutation score below target: 75.50%"]);
  });

  it("raises low docs and governance issues for undocumented changes", () => {
    const issues = classifyIssues({
      ...base,
      git: {
        ok: true,
        value: {
          branch: "develop",
          changes: [{ status: "M", path: "src/a.ts" }],
          changelogUpdated: false,
          planUpdated: true,
        },
      },
    });
    expect(issues.map((issue) => [issue.category, issue.severity])).toEqual([["docs", "low"]]);
  });

  it("reports dev-log error events as a medium infra issue", () => {
    const devLogs = {
      root: "/repo/.autoloop/dev",
      sessionFilesTotal: 4,
      sessionsScanned: 2,
      eventsScanned: 30,
      errorEvents: 3,
      parseErrors: 0,
    };
    expect(classifyIssues({ ...base, devLogs: { ok: true, value: devLogs } })).toEqual([
      {
        category: "infra",
        severity: "medium",
        source: "status.devLogs",
        summary: "Dev logs recorded 3 error event(s) across 2 session(s).",
      },
    ]);
    expect(classifyIssues({ ...base, devLogs: { ok: true, value: { ...devLogs, errorEvents: 0 } } })).toEqual([]);
  });

  it("rolls up counts with sorted keys and derives next actions", () => {
    const issues = classifyIssues({
      ...base,
      ci: { ok: false, error: "offline" },
      mutants: { ok: false, error: "missing" },
    });
    const rollup = buildIssueRollup(issues);
    expect(rollup).toEqual({
      total: 2,
      bySeverity: { high: 1, medium: 1 },
      byCategory: { infra: 1, quality: 1 },
    });
    expect(Object.keys(rollup.byCategory)).toEqual(["infra", "quality"]);
    expect(buildNextActions(issues)).toHaveLength(2);
    expect(buildNextActions([])).toEqual(["No urgent triage actions detected from current signals."]);
  });
});
