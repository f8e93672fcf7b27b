import { formatError } from "../../infra/errors.js";
import type { CommentTarget, NotifyResult, TriageReport } from "../types.js";
import type { CommentTargetRef, WorkflowClient } from "../workflow/types.js";
import { normalizeSha } from "./backlog.js";
import { renderAttemptLines } from "./render.js";

export type ResolvedCommentTarget = CommentTargetRef & {
  sourceRunId: number | null;
  sourceSha: string | null;
};

export type CommentTargetResolution =
  | { ok: true; target: ResolvedCommentTarget }
  | { ok: false; error: string };

function positiveInt(value: number | null | undefined) {
  return value !== null && value !== undefined && Number.isInteger(value) && value > 0 ? value : null;
}

export function resolveCommentTarget(
  report: TriageReport,
  request: { commentTarget: CommentTarget; commentPrNumber?: number | null },
): CommentTargetResolution {
  const first = report.attempts.at(0);
  const explicitPr = positiveInt(request.commentPrNumber);
  const artifactPr = positiveInt(first?.backlogPrNumber) ?? positiveInt(report.backlogPrNumber);
  const sourceRunId = positiveInt(report.sourceRunId);
  const sourceSha = normalizeSha(report.sourceRunSha) || normalizeSha(first?.runSha) || null;
  const prNumber = explicitPr ?? artifactPr;

  switch (request.commentTarget) {
    case "pr":
      if (prNumber === null) {
        return {
          ok: false,
          error: "comment-target=pr requires --comment-pr-number or backlog pr_number metadata",
        };
      }
      return { ok: true, target: { kind: "pr", id: prNumber, sourceRunId, sourceSha } };
    case "commit":
      if (!sourceSha) {
        return {
          ok: false,
          error: "comment-target=commit requires source sha from --source-run-sha or loop attempt run sha",
        };
      }
      return { ok: true, target: { kind: "commit", id: sourceSha, sourceRunId, sourceSha } };
    case "auto":
      if (prNumber !== null) {
        return { ok: true, target: { kind: "pr", id: prNumber, sourceRunId, sourceSha } };
      }
      if (!sourceSha) {
        return { ok: false, error: "auto comment target could not resolve PR or commit sha" };
      }
      return { ok: true, target: { kind: "commit", id: sourceSha, sourceRunId, sourceSha } };
  }
}

/** Hidden marker that identifies the loop's comment on a target so reruns update it in place. */
export function commentMarker(target: ResolvedCommentTarget) {
  return `<!-- autoloop:target=${target.kind}:${target.id};run_id=${target.sourceRunId ?? "none"};sha=${target.sourceSha ?? "none"} -->`;
}

export function renderNotificationComment(report: TriageReport, marker: string) {
  return [
    marker,
    "## Autoloop triage",
    "",
    `- repo: \`${report.repo}\``,
    `- branch: \`${report.branch}\``,
    `- mode: \`${report.mode}\``,
    `- notify: \`${report.notify}\``,
    `- source_event: \`${report.sourceEvent}\``,
    `- source_run_id: \`${report.sourceRunId ?? "n/a"}\``,
    `- source_run_sha: \`${report.sourceRunSha ?? "n/a"}\``,
    `- source_correlation: \`${report.sourceCorrelation}\``,
    `- unresolved_count: \`${report.unresolvedCount}\``,
    `- reason: \`${report.reason}\``,
    "",
    "### Attempts",
    "",
    ...renderAttemptLines(report.attempts),
  ].join("\n");
}

export async function publishNotificationComment(params: {
  report: TriageReport;
  client: WorkflowClient;
  commentTarget: CommentTarget;
  commentPrNumber?: number | null;
}): Promise<NotifyResult> {
  const resolved = resolveCommentTarget(params.report, params);
  if (!resolved.ok) {
    return { ok: false, mode: "summary-and-comment", error: resolved.error };
  }
  const target = resolved.target;
  const marker = commentMarker(target);
  const ref: CommentTargetRef =
    target.kind === "pr" ? { kind: "pr", id: target.id } : { kind: "commit", id: target.id };
  try {
    const comment = await params.client.upsertComment({
      target: ref,
      marker,
      body: renderNotificationComment(params.report, marker),
    });
    return {
      ok: true,
      mode: "summary-and-comment",
      targetKind: target.kind,
      targetId: String(target.id),
      ...(comment.id !== null ? { commentId: comment.id } : {}),
      ...(comment.url !== null ? { commentUrl: comment.url } : {}),
      action: comment.action,
    };
  } catch (err) {
    return {
      ok: false,
      mode: "summary-and-comment",
      targetKind: target.kind,
      targetId: String(target.id),
      error: formatError(err),
    };
  }
}
