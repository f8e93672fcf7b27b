import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Clock } from "../../infra/clock.js";
import { formatError } from "../../infra/errors.js";
import { silentLogger, type AutonomyLogger } from "../../logging/subsystem.js";
import type { SourceEvent, TriageAttempt, TriageLoopResult } from "../types.js";
import type { WorkflowClient } from "../workflow/types.js";
import {
  waitForLatestCompleted,
  waitForNewCompletedRun,
  waitForRunCompletedById,
  type WaitBudget,
} from "../workflow/wait.js";
import { loadBacklog, normalizeSha } from "./backlog.js";
import { buildFixCommandEnv, runFixCommand, type FixCommandRunner } from "./fix-runner.js";

export const DEFAULT_TRIAGE_WORKFLOW = "Backlog Triage";

export type TriageLoopParams = {
  repo: string;
  branch: string;
  workflow: string;
  maxAttempts: number;
  runListLimit: number;
  pollSeconds: number;
  timeoutSeconds: number;
  /** Tokenized fix command; absent means report only. */
  fixArgv?: readonly string[];
  fixBlockReason?: string | null;
  /** Defaults to `timeoutSeconds`. */
  fixTimeoutSeconds?: number;
  sourceRunId?: number;
  sourceRunSha?: string;
  sourceEvent?: SourceEvent;
  planId?: string;
  /** Working directory of the fix command. */
  cwd: string;
};

export type TriageLoopDeps = {
  client: WorkflowClient;
  clock: Clock;
  logger?: AutonomyLogger;
  runFix?: FixCommandRunner;
  /** Environment the fix command inherits before the AUTOLOOP_* parameters are added. */
  env?: Readonly<Record<string, string | undefined>>;
  tmpDir?: string;
};

/** The report shape before any attempt ran; dry-run and connectivity short-circuits start here too. */
export function createTriageLoopResult(
  params: Pick<
    TriageLoopParams,
    "repo" | "branch" | "workflow" | "maxAttempts" | "fixArgv" | "fixBlockReason" | "sourceRunId" | "sourceRunSha" | "sourceEvent"
  >,
): TriageLoopResult {
  const sourceRunId = params.sourceRunId;
  return {
    ok: false,
    repo: params.repo,
    branch: params.branch,
    workflow: params.workflow,
    maxAttempts: params.maxAttempts,
    completedAttempts: 0,
    attempts: [],
    unresolvedCount: 0,
    reason: "max attempts reached with unresolved backlog",
    fixCommandConfigured: Boolean(params.fixArgv),
    fixBlockReason: params.fixBlockReason ?? null,
    escalationNeeded: false,
    sourceRunId: sourceRunId !== undefined && sourceRunId > 0 ? sourceRunId : null,
    sourceRunSha: normalizeSha(params.sourceRunSha) || null,
    sourceEvent: params.sourceEvent ?? "workflow_dispatch",
    sourceCorrelation: sourceRunId !== undefined ? "pending" : "branch_latest_fallback",
    backlogPrNumber: null,
    backlogHeadSha: null,
  };
}

/**
 * Bounded attempt loop against one workflow and branch: wait for a completed run, read
 * its backlog artifact, then stop, or run the fix command and wait for a run on a new
 * head commit. Never throws for remote or artifact failures; they end up in `reason`.
 */
export async function executeTriageLoop(
  params: TriageLoopParams,
  deps: TriageLoopDeps,
): Promise<TriageLoopResult> {
  const logger = deps.logger ?? silentLogger;
  const runFix = deps.runFix ?? runFixCommand;
  const report = createTriageLoopResult(params);
  const expectedSha = normalizeSha(params.sourceRunSha);
  const sourceRunId = params.sourceRunId;
  const budget: WaitBudget = { pollSeconds: params.pollSeconds, timeoutSeconds: params.timeoutSeconds };
  const fixTimeoutSeconds = params.fixTimeoutSeconds ?? params.timeoutSeconds;

  if (sourceRunId !== undefined && sourceRunId <= 0) {
    return { ...report, reason: "invalid source run id", sourceCorrelation: "invalid_source_run_id" };
  }

  const runAttempt = async (attempt: number): Promise<boolean> => {
    const sourceId = attempt === 1 ? sourceRunId : undefined;
    const waited =
      sourceId !== undefined
        ? await waitForRunCompletedById({ client: deps.client, clock: deps.clock, runId: sourceId, budget })
        : await waitForLatestCompleted({
            client: deps.client,
            clock: deps.clock,
            workflow: params.workflow,
            branch: params.branch,
            limit: params.runListLimit,
            budget,
          });
    if (!waited.ok) {
      report.reason = waited.reason;
      report.detail = waited.detail;
      logger.warn(`attempt ${attempt}: ${waited.reason} (${waited.detail})`);
      return true;
    }

    const run = waited.run;
    const runSha = normalizeSha(run.headSha);
    const row: TriageAttempt = {
      attempt,
      runId: run.id,
      runSha,
      runUrl: run.url.trim(),
      runConclusion: run.conclusion.trim().toLowerCase(),
      status: "analyzing-backlog",
    };
    if (sourceId !== undefined) {
      row.sourceRunId = sourceId;
      row.sourceRunShaExpected = expectedSha || null;
    }
    const fail = (message: string) => {
      row.status = "failed";
      row.message = message;
      report.attempts.push(row);
      report.completedAttempts = attempt;
    };

    if (run.id <= 0) {
      fail("latest run missing id");
      report.reason = "latest run missing id";
      return true;
    }
    if (sourceId !== undefined && run.id !== sourceId) {
      row.sourceCorrelation = "source_run_id_mismatch";
      fail(`source run mismatch: expected ${sourceId}, resolved ${run.id}`);
      report.reason = "source_run_id_mismatch";
      report.sourceCorrelation = "source_run_id_mismatch";
      return true;
    }
    if (sourceId !== undefined && expectedSha) {
      if (runSha !== expectedSha) {
        row.sourceCorrelation = "source_run_sha_mismatch";
        fail(`source run sha mismatch: expected ${expectedSha}, got ${runSha || "(missing)"}`);
        report.reason = "source_run_sha_mismatch";
        report.sourceCorrelation = "source_run_sha_mismatch";
        return true;
      }
      report.sourceRunSha = runSha;
      report.sourceCorrelation = "source_run_validated";
    }

    const tempDir = await fs.mkdtemp(path.join(deps.tmpDir ?? os.tmpdir(), "autoloop-triage-"));
    const downloadRoot = path.join(tempDir, `attempt-${attempt}`);
    try {
      try {
        await deps.client.downloadArtifacts(run.id, downloadRoot);
      } catch (err) {
        fail(`artifact download failed: ${formatError(err)}`);
        report.reason = "artifact download failed";
        return true;
      }

      const loaded = await loadBacklog(downloadRoot);
      if (!loaded.ok) {
        fail(`backlog parse failed: ${loaded.message}`);
        report.reason = loaded.reason;
        return true;
      }
      const backlog = loaded.backlog;
      if (backlog.prNumber !== null) {
        row.backlogPrNumber = backlog.prNumber;
        report.backlogPrNumber = backlog.prNumber;
      }
      if (backlog.headSha) {
        row.backlogHeadSha = backlog.headSha;
        report.backlogHeadSha = backlog.headSha;
      }
      if (sourceId !== undefined && expectedSha) {
        if (backlog.headSha !== expectedSha) {
          row.sourceCorrelation = "source_run_sha_mismatch";
          fail(
            `source artifact sha mismatch: expected ${expectedSha}, got ${backlog.headSha ?? "(missing)"}`,
          );
          report.reason = "source_run_sha_mismatch";
          report.sourceCorrelation = "source_run_sha_mismatch";
          return true;
        }
        report.sourceCorrelation = "source_artifact_sha_validated";
      }

      const backlogCount = backlog.items.length;
      row.backlogCount = backlogCount;
      report.unresolvedCount = backlogCount;
      logger.info(`attempt ${attempt}: run ${run.id} (${row.runConclusion || "unknown"}) backlog=${backlogCount}`);

      const finish = (status: TriageAttempt["status"], message?: string) => {
        row.status = status;
        if (message !== undefined) {
          row.message = message;
        }
        report.attempts.push(row);
        report.completedAttempts = attempt;
      };

      if (backlogCount === 0) {
        finish("resolved", "medium+ backlog is empty");
        report.ok = true;
        report.reason = "resolved";
        return true;
      }
      if (!params.fixArgv) {
        finish("blocked", "medium+ backlog remains but no fix command configured");
        report.reason = "no fix command configured";
        return true;
      }
      if (params.fixBlockReason) {
        finish("blocked", params.fixBlockReason);
        report.reason = "fix_command_policy_blocked";
        return true;
      }

      const fix = await runFix({
        argv: params.fixArgv,
        cwd: params.cwd,
        timeoutMs: fixTimeoutSeconds * 1000,
        env: buildFixCommandEnv(deps.env ?? {}, {
          planId: params.planId ?? "",
          attempt,
          repo: params.repo,
          branch: params.branch,
          backlogCount,
          backlogDir: downloadRoot,
          runId: run.id,
          runSha,
        }),
      });
      if (fix.error !== undefined) {
        row.fixExitCode = 127;
        finish("failed", `fix command error: ${fix.error}`);
        report.reason = "fix command error";
        return true;
      }
      row.fixExitCode = fix.code;
      if (fix.killed) {
        finish("failed", `fix command exceeded ${fixTimeoutSeconds}s timeout`);
        report.reason = "fix command timed out";
        return true;
      }
      if (fix.code !== 0) {
        logger.warn(`attempt ${attempt}: fix command exited with ${fix.code ?? "signal"}`);
        finish("failed", "fix command returned non-zero exit code");
        report.reason = "fix command failed";
        return true;
      }
      finish("waiting-for-new-run");
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }

    const next = await waitForNewCompletedRun({
      client: deps.client,
      clock: deps.clock,
      workflow: params.workflow,
      branch: params.branch,
      limit: params.runListLimit,
      previousSha: runSha,
      budget,
    });
    if (!next.ok) {
      report.reason = next.reason;
      report.detail = next.detail;
      return true;
    }
    return false;
  };

  for (let attempt = 1; attempt <= params.maxAttempts; attempt += 1) {
    if (await runAttempt(attempt)) {
      return report;
    }
  }
  report.reason = "max attempts reached with unresolved backlog";
  report.escalationNeeded = true;
  return report;
}
