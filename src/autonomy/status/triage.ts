import type { IssueRollup, ProjectReport, TriageIssue } from "./types.js";

const FAILURE_CONCLUSIONS = new Set([
  "failure",
  "timed_out",
  "cancelled",
  "action_required",
  "startup_failure",
]);

const MUTATION_SCORE_TARGET = 80;

/** Ratios in 0..1 are scaled to percent; anything else is taken as a percentage already. */
export function scoreToPercent(score: number | null) {
  if (score === null || !Number.isFinite(score)) {
    return null;
  }
  return score >= 0 && score <= 1 ? score * 100 : score;
}

export function classifyIssues(report: ProjectReport): TriageIssue[] {
  const issues: TriageIssue[] = [];
  if (report.ci) {
    if (!report.ci.ok) {
      issues.push({
        category: "infra",
        severity: "high",
        source: "status.ci",
        summary: `CI fetch failed: ${report.ci.error}`,
      });
    } else {
      for (const run of report.ci.value.runs) {
        if (!FAILURE_CONCLUSIONS.has(run.conclusion)) {
          continue;
        }
        issues.push({
          category: "ci",
          severity: run.conclusion === "failure" ? "high" : "medium",
          source: "status.ci",
          summary: `${run.displayTitle || "unknown"}: ${run.status}/${run.conclusion}`,
        });
      }
    }
  }

  if (report.mutants) {
    if (!report.mutants.ok) {
      issues.push({
        category: "quality",
        severity: "medium",
        source: "status.mutants",
        summary: `Mutation summary unavailable: ${report.mutants.error}`,
      });
    } else {
      const percent = scoreToPercent(report.mutants.value.score);
      if (percent !== null && percent < MUTATION_SCORE_TARGET) {
        issues.push({
          category: "quality",
          severity: "medium",
          source: "status.mutants",
          summary: `Mutation score below target: ${percent.toFixed(2)}%`,
        });
      }
    }
  }

  if (report.devLogs?.ok && report.devLogs.value.errorEvents > 0) {
    const { errorEvents, sessionsScanned } = report.devLogs.value;
    issues.push({
      category: "infra",
      severity: "medium",
      source: "status.devLogs",
      summary: `Dev logs recorded ${errorEvents} error event(s) across ${sessionsScanned} session(s).`,
    });
  }

  if (report.git?.ok && report.git.value.changes.length > 0) {
    if (!report.git.value.changelogUpdated) {
      issues.push({
        category: "docs",
        severity: "low",
        source: "status.git",
        summary: "Working tree has changes but the changelog was not updated.",
      });
    }
    if (!report.git.value.planUpdated) {
      issues.push({
        category: "governance",
        severity: "low",
        source: "status.git",
        summary: "Working tree has changes but the plan document was not updated.",
      });
    }
  }
  return issues;
}

function countSorted(values: readonly string[]) {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return Object.fromEntries([...counts.entries()].toSorted(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

export function buildIssueRollup(issues: readonly TriageIssue[]): IssueRollup {
  return {
    total: issues.length,
    bySeverity: countSorted(issues.map((issue) => issue.severity)),
    byCategory: countSorted(issues.map((issue) => issue.category)),
  };
}

export function buildNextActions(issues: readonly TriageIssue[]) {
  if (issues.length === 0) {
    return ["No urgent triage actions detected from current signals."];
  }
  const categories = new Set(issues.map((issue) => issue.category));
  const actions: string[] = [];
  if (categories.has("ci") || categories.has("infra")) {
    actions.push("Inspect failing workflow runs with `gh run list` and rerun the triage workflow once fixed.");
  }
  if (categories.has("quality")) {
    actions.push("Refresh the mutation summary and confirm quality gates before enabling fix mode.");
  }
  if (categories.has("docs") || categories.has("governance")) {
    actions.push("Update the changelog and plan document for the pending working-tree changes.");
  }
  return actions;
}
