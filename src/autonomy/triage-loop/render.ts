import type { TriageAttempt, TriageReport } from "../types.js";

export function renderAttemptLines(attempts: readonly TriageAttempt[]) {
  if (attempts.length === 0) {
    return ["- none"];
  }
  return attempts.map((row) => {
    const parts = [
      `#${row.attempt}`,
      `run=${row.runId}`,
      `sha=${row.runSha || "n/a"}`,
      `conclusion=${row.runConclusion || "n/a"}`,
      `status=${row.status}`,
    ];
    if (row.backlogCount !== undefined) {
      parts.push(`backlog=${row.backlogCount}`);
    }
    if (row.fixExitCode !== undefined) {
      parts.push(`fix_exit=${row.fixExitCode ?? "none"}`);
    }
    const line = `- ${parts.join(" ")}`;
    return row.message ? `${line}: ${row.message}` : line;
  });
}

export function renderTriageMarkdown(report: TriageReport) {
  const lines = [
    "# autoloop triage-loop",
    "",
    `- ok: ${report.ok}`,
    `- repo: ${report.repo}`,
    `- branch: ${report.branch}`,
    `- workflow: ${report.workflow}`,
    `- mode: ${report.mode}`,
    `- reason: ${report.reason}`,
    `- unresolved_count: ${report.unresolvedCount}`,
    `- attempts: ${report.completedAttempts}/${report.maxAttempts}`,
    `- fix_command_effective: ${report.fixCommandEffective}`,
    `- source_event: ${report.sourceEvent}`,
    `- source_run_id: ${report.sourceRunId ?? "n/a"}`,
    `- source_run_sha: ${report.sourceRunSha ?? "n/a"}`,
    `- source_correlation: ${report.sourceCorrelation}`,
    `- escalation_needed: ${report.escalationNeeded}`,
  ];
  if (report.detail) {
    lines.push(`- detail: ${report.detail}`);
  }
  if (report.fixBlockReason) {
    lines.push(`- fix_block_reason: ${report.fixBlockReason}`);
  }
  if (report.notifyResult) {
    const notify = report.notifyResult;
    const state = notify.skipped ? "skipped" : notify.ok ? (notify.action ?? "ok") : "failed";
    lines.push(`- notify: ${notify.mode} (${state})`);
  }
  lines.push("", "## Attempts", "", ...renderAttemptLines(report.attempts));
  if (report.warnings.length > 0) {
    lines.push("", "## Warnings", "", ...report.warnings.map((warning) => `- ${warning}`));
  }
  return lines.join("\n");
}
