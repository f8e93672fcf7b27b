import path from "node:path";
import type { RuntimeConfig } from "../../config/runtime-config.js";
import { isoTimestamp, type Clock } from "../../infra/clock.js";
import { formatError, InputValidationError } from "../../infra/errors.js";
import { writeJsonAtomic, writeTextAtomic } from "../../infra/json-file.js";
import { silentLogger, type AutonomyLogger } from "../../logging/subsystem.js";
import { splitCommandLine } from "../../process/argv.js";
import { evaluateFixCommandPolicy } from "../policy/fix-policy.js";
import type { ControlPlanePolicy } from "../policy/types.js";
import type {
  CommentTarget,
  LoopMode,
  NotifyMode,
  SourceEvent,
  TriageLoopResult,
  TriageReport,
} from "../types.js";
import { isNonBlockingLocalConnectivityError } from "../workflow/connectivity.js";
import type { WorkflowClient } from "../workflow/types.js";
import { createTriageLoopResult, executeTriageLoop, type TriageLoopParams } from "./engine.js";
import type { FixCommandRunner } from "./fix-runner.js";
import { publishNotificationComment } from "./notify.js";
import { renderTriageMarkdown } from "./render.js";

export type TriageLoopOptions = {
  repo?: string;
  branch: string;
  workflow: string;
  mode: LoopMode;
  fixCommand?: string;
  maxAttempts: number;
  runListLimit: number;
  pollSeconds: number;
  timeoutSeconds: number;
  fixTimeoutSeconds?: number;
  sourceRunId?: number;
  sourceRunSha?: string;
  sourceEvent: SourceEvent;
  notify: NotifyMode;
  commentTarget: CommentTarget;
  commentPrNumber?: number;
  planId?: string;
  dryRun: boolean;
  emitBundle: boolean;
  bundleDir: string;
  bundlePrefix: string;
};

export type TriageLoopCommandDeps = {
  config: RuntimeConfig;
  policy: ControlPlanePolicy;
  client: WorkflowClient;
  clock: Clock;
  logger?: AutonomyLogger;
  runFix?: FixCommandRunner;
  env?: Readonly<Record<string, string | undefined>>;
};

export type TriageLoopCommandResult = { exitCode: number; report: TriageReport };

export function validateTriageLoopOptions(options: TriageLoopOptions, config: RuntimeConfig) {
  const repo = options.repo?.trim() || config.repo;
  if (!repo) {
    throw new InputValidationError(
      "unable to resolve repository (pass --repo or set GITHUB_REPOSITORY)",
    );
  }
  if (options.maxAttempts < 1) {
    throw new InputValidationError("--max-attempts must be >= 1");
  }
  if (options.pollSeconds < 5) {
    throw new InputValidationError("--poll-seconds must be >= 5");
  }
  if (options.timeoutSeconds < 60) {
    throw new InputValidationError("--timeout-seconds must be >= 60");
  }
  if (options.fixTimeoutSeconds !== undefined && options.fixTimeoutSeconds < 1) {
    throw new InputValidationError("--fix-timeout-seconds must be >= 1");
  }
  if (options.sourceEvent === "workflow_run" && options.sourceRunId === undefined) {
    throw new InputValidationError("--source-event workflow_run requires --source-run-id");
  }
  return repo;
}

export function effectiveFixCommand(mode: LoopMode, fixCommand: string | undefined) {
  if (mode === "report-only") {
    return undefined;
  }
  return fixCommand?.trim() || undefined;
}

function tokenizeFixCommand(command: string | undefined) {
  if (!command) {
    return undefined;
  }
  try {
    return splitCommandLine(command);
  } catch {
    // an empty argv makes the policy gate report the tokenization failure
    return [];
  }
}

export async function writeTriageBundle(params: {
  report: TriageReport;
  dir: string;
  prefix: string;
}): Promise<TriageReport> {
  const markdownPath = path.join(params.dir, `${params.prefix}.md`);
  const jsonPath = path.join(params.dir, `${params.prefix}.json`);
  const report: TriageReport = {
    ...params.report,
    bundle: { written: true, dir: params.dir, markdown: markdownPath, json: jsonPath },
  };
  await writeTextAtomic(markdownPath, `${renderTriageMarkdown(report)}\n`);
  await writeJsonAtomic(jsonPath, report);
  return report;
}

/**
 * Command wrapper around {@link executeTriageLoop}: validates flags, applies the mode and
 * fix-command policy, short-circuits dry runs and unreachable local networks, publishes the
 * notification comment and writes the report bundle.
 */
export async function runTriageLoop(
  options: TriageLoopOptions,
  deps: TriageLoopCommandDeps,
): Promise<TriageLoopCommandResult> {
  const logger = deps.logger ?? silentLogger;
  const repo = validateTriageLoopOptions(options, deps.config);
  const warnings: string[] = [];

  const fixCommand = effectiveFixCommand(options.mode, options.fixCommand);
  if (options.mode !== "report-only" && !fixCommand) {
    warnings.push(
      `mode=${options.mode} requested but no --fix-command configured; backlog can only be reported.`,
    );
  }
  const fixArgv = tokenizeFixCommand(fixCommand);
  const fixBlockReason =
    evaluateFixCommandPolicy({
      mode: options.mode,
      branch: options.branch,
      fixArgv,
      policy: deps.policy,
      config: deps.config,
    }) ?? null;
  if (fixBlockReason) {
    warnings.push(fixBlockReason);
  }

  const params: TriageLoopParams = {
    repo,
    branch: options.branch,
    workflow: options.workflow,
    maxAttempts: options.maxAttempts,
    runListLimit: options.runListLimit,
    pollSeconds: options.pollSeconds,
    timeoutSeconds: options.timeoutSeconds,
    fixArgv,
    fixBlockReason,
    fixTimeoutSeconds: options.fixTimeoutSeconds,
    sourceRunId: options.sourceRunId,
    sourceRunSha: options.sourceRunSha,
    sourceEvent: options.sourceEvent,
    planId: options.planId,
    cwd: deps.config.repoRoot,
  };

  let loop: TriageLoopResult;
  if (options.dryRun) {
    loop = { ...createTriageLoopResult(params), ok: true, reason: "dry-run", sourceCorrelation: "dry-run" };
  } else {
    const connectivityError = await preflightConnectivity(deps);
    if (connectivityError) {
      warnings.push(
        "unable to reach the workflow API from the local environment; triage-loop treated as non-blocking outside CI.",
      );
      loop = {
        ...createTriageLoopResult(params),
        ok: true,
        reason: "gh_unreachable_local_non_blocking",
        sourceCorrelation: "branch_latest_fallback",
        connectivityError,
      };
    } else {
      loop = await executeTriageLoop(params, {
        client: deps.client,
        clock: deps.clock,
        logger,
        runFix: deps.runFix,
        env: deps.env,
      });
    }
  }

  if (loop.detail && isNonBlockingLocalConnectivityError(loop.detail, deps.config)) {
    warnings.push(
      "nested triage loop reported a workflow API connectivity failure; converted to non-blocking local result.",
    );
    loop = { ...loop, ok: true, reason: "gh_unreachable_local_non_blocking", connectivityError: loop.detail };
  }

  let report: TriageReport = {
    ...loop,
    schemaVersion: 1,
    command: "triage-loop",
    timestamp: isoTimestamp(deps.clock.now()),
    mode: options.mode,
    notify: options.notify,
    commentTarget: options.commentTarget,
    commentPrNumber: options.commentPrNumber ?? null,
    dryRun: options.dryRun,
    fixCommandRequested: Boolean(options.fixCommand?.trim()),
    fixCommandEffective: Boolean(fixCommand),
    warnings,
    bundle: { written: false },
  };

  if (report.reason === "gh_unreachable_local_non_blocking") {
    report.notifyResult = {
      ok: true,
      mode: options.notify,
      skipped: true,
      reason: "gh_unreachable_local_non_blocking",
    };
  } else if (options.notify === "summary-and-comment" && !options.dryRun) {
    const notifyResult = await publishNotificationComment({
      report,
      client: deps.client,
      commentTarget: options.commentTarget,
      commentPrNumber: options.commentPrNumber,
    });
    report.notifyResult = notifyResult;
    if (!notifyResult.ok) {
      report.ok = false;
      report.reason = "notification_comment_failed";
      warnings.push(
        `summary-and-comment requested but comment publication failed: ${notifyResult.error ?? "unknown error"}`,
      );
    }
  } else if (options.notify === "summary-only") {
    report.notifyResult = { ok: true, mode: "summary-only", skipped: true };
  }

  if (options.emitBundle) {
    report = await writeTriageBundle({
      report,
      dir: path.resolve(deps.config.repoRoot, options.bundleDir),
      prefix: options.bundlePrefix,
    });
  }

  logger.info(`triage-loop finished: ${report.reason} (unresolved=${report.unresolvedCount})`);
  return { exitCode: report.ok ? 0 : 1, report };
}

async function preflightConnectivity(deps: TriageLoopCommandDeps) {
  try {
    await deps.client.checkConnectivity();
    return undefined;
  } catch (err) {
    const message = formatError(err);
    return isNonBlockingLocalConnectivityError(message, deps.config) ? message : undefined;
  }
}
