import type { RuntimeConfig } from "../../config/runtime-config.js";
import { resolveRepoPath } from "../../config/runtime-config.js";
import { isoTimestamp, type Clock } from "../../infra/clock.js";
import { formatError, InputValidationError } from "../../infra/errors.js";
import { writeJsonAtomic } from "../../infra/json-file.js";
import { silentLogger, type AutonomyLogger } from "../../logging/subsystem.js";
import { noopEventLog, type EventLogWriter } from "../ledger/store.js";
import { loadPhoneStatus } from "../phone/payload.js";
import { viewPayload, type ViewPayload } from "../phone/views.js";
import { isBranchAllowed, isWorkflowDispatchAllowed } from "../policy/runtime.js";
import type { ControlPlanePolicy } from "../policy/types.js";
import type { AutonomyMode, ControllerActionName, ControllerActionReason, PhoneView } from "../types.js";
import { isNonBlockingLocalConnectivityError } from "../workflow/connectivity.js";
import { buildDispatchArgv, buildSetVariableArgv } from "../workflow/gh-client.js";
import type { WorkflowClient } from "../workflow/types.js";

export const CONTROLLER_ACTIONS: readonly ControllerActionName[] = [
  "refresh-status",
  "dispatch-report-only",
  "pause-loop",
  "resume-loop",
];

export const DEFAULT_MODE_FILE = "dev/reports/autonomy/queue/phone/controller-mode.json";

export type ControllerActionOptions = {
  action: string;
  repo?: string;
  branch: string;
  workflow: string;
  maxAttempts: number;
  view: PhoneView;
  phoneJson: string;
  modeFile: string;
  remote: boolean;
  dryRun: boolean;
};

export type ControllerActionDeps = {
  config: RuntimeConfig;
  policy: ControlPlanePolicy;
  client: WorkflowClient;
  clock: Clock;
  logger?: AutonomyLogger;
  eventLog?: EventLogWriter;
};

export type RemoteCallResult = { command: string; output?: string };

export type ControllerActionResult =
  | ({ kind: "dispatch" } & RemoteCallResult)
  | {
      kind: "mode";
      requestedMode: AutonomyMode;
      modeFile: string;
      remote: boolean;
      remoteResult: RemoteCallResult | null;
    }
  | { kind: "status"; view: PhoneView; phoneJson: string; projection: ViewPayload };

export type ControllerActionReport = {
  command: "controller-action";
  timestamp: string;
  ok: boolean;
  action: string;
  reason: ControllerActionReason;
  repo: string;
  branch: string;
  workflow: string;
  autonomyModeRuntime: AutonomyMode;
  dryRun: boolean;
  result: ControllerActionResult | null;
  warnings: string[];
  errors: string[];
};

/** Persisted by pause/resume; later invocations and operators read it as the requested mode. */
export type ControllerModeState = {
  schemaVersion: 1;
  timestamp: string;
  action: ControllerActionName;
  requestedMode: AutonomyMode;
  repo: string;
  branch: string;
  remoteEnabled: boolean;
  remoteOk: boolean;
  dryRun: boolean;
  warnings: string[];
  errors: string[];
};

type Outcome = {
  ok: boolean;
  reason: ControllerActionReason;
  result: ControllerActionResult | null;
};

type ActionContext = {
  options: ControllerActionOptions;
  deps: ControllerActionDeps;
  repo: string;
  warnings: string[];
  errors: string[];
};

function isControllerActionName(value: string): value is ControllerActionName {
  return CONTROLLER_ACTIONS.some((action) => action === value);
}

type RemoteCall =
  | { ok: true; result: RemoteCallResult }
  | { ok: false; message: string; result: RemoteCallResult };

async function callRemote(
  ctx: ActionContext,
  argv: string[],
  call: () => Promise<string | undefined>,
): Promise<RemoteCall> {
  const command = argv.join(" ");
  if (ctx.options.dryRun) {
    return { ok: true, result: { command } };
  }
  try {
    const output = await call();
    return { ok: true, result: output ? { command, output: output.trim() } : { command } };
  } catch (err) {
    return { ok: false, message: formatError(err), result: { command } };
  }
}

async function dispatchReportOnly(ctx: ActionContext): Promise<Outcome> {
  const workflow = ctx.options.workflow.trim();
  const branch = ctx.options.branch.trim();
  const { policy, config, client } = ctx.deps;
  if (!isWorkflowDispatchAllowed(policy, workflow)) {
    ctx.errors.push(`workflow not allowlisted by policy: ${workflow}`);
    return { ok: false, reason: "workflow_not_allowlisted", result: null };
  }
  if (!isBranchAllowed(policy, branch)) {
    ctx.errors.push(`branch not allowlisted by policy: ${branch}`);
    return { ok: false, reason: "branch_not_allowlisted", result: null };
  }
  if (config.autonomyMode === "off") {
    ctx.errors.push("AUTONOMY_MODE=off blocks dispatch actions");
    return { ok: false, reason: "autonomy_mode_off", result: null };
  }

  const inputs = {
    branch,
    execution_mode: "report-only",
    max_attempts: String(ctx.options.maxAttempts),
    notify_mode: "summary-only",
    comment_target: "auto",
  };
  const call = await callRemote(
    ctx,
    buildDispatchArgv({ repo: ctx.repo, workflow, ref: branch, inputs }),
    () => client.dispatchWorkflow({ workflow, ref: branch, inputs }),
  );
  const result: ControllerActionResult = { kind: "dispatch", ...call.result };
  if (call.ok) {
    return { ok: true, reason: "dispatched_report_only", result };
  }
  if (isNonBlockingLocalConnectivityError(call.message, config)) {
    ctx.warnings.push("unable to reach the workflow API from the local environment; dispatch treated as non-blocking");
    return { ok: true, reason: "gh_unreachable_local_non_blocking", result };
  }
  ctx.errors.push(call.message);
  return { ok: false, reason: "dispatch_failed", result };
}

async function setMode(
  ctx: ActionContext,
  action: ControllerActionName,
  requestedMode: AutonomyMode,
): Promise<Outcome> {
  const { config, client, clock } = ctx.deps;
  if (config.autonomyMode === "off") {
    ctx.errors.push("AUTONOMY_MODE=off blocks controller mode actions");
    return { ok: false, reason: "autonomy_mode_off", result: null };
  }

  let remoteOk = true;
  let remoteResult: RemoteCallResult | null = null;
  if (ctx.options.remote) {
    const call = await callRemote(
      ctx,
      buildSetVariableArgv({ repo: ctx.repo, name: "AUTONOMY_MODE", value: requestedMode }),
      async () => {
        await client.setVariable({ name: "AUTONOMY_MODE", value: requestedMode });
        return undefined;
      },
    );
    remoteResult = call.result;
    if (!call.ok) {
      if (isNonBlockingLocalConnectivityError(call.message, config)) {
        ctx.warnings.push(
          "unable to reach the workflow API from the local environment; remote mode update treated as non-blocking",
        );
      } else {
        remoteOk = false;
        ctx.errors.push(call.message);
      }
    }
  }

  const state: ControllerModeState = {
    schemaVersion: 1,
    timestamp: isoTimestamp(clock.now()),
    action,
    requestedMode,
    repo: ctx.repo,
    branch: ctx.options.branch,
    remoteEnabled: ctx.options.remote,
    remoteOk,
    dryRun: ctx.options.dryRun,
    warnings: [...ctx.warnings],
    errors: [...ctx.errors],
  };
  const modeFile = await writeJsonAtomic(resolveRepoPath(config, ctx.options.modeFile), state);
  const result: ControllerActionResult = {
    kind: "mode",
    requestedMode,
    modeFile,
    remote: ctx.options.remote,
    remoteResult,
  };
  if (remoteOk && ctx.errors.length === 0) {
    return { ok: true, reason: "mode_updated", result };
  }
  return { ok: false, reason: "mode_update_failed", result };
}

async function refreshStatus(ctx: ActionContext): Promise<Outcome> {
  const loaded = await loadPhoneStatus(resolveRepoPath(ctx.deps.config, ctx.options.phoneJson));
  if (!loaded.ok) {
    ctx.errors.push(loaded.error);
    return { ok: false, reason: "phone_status_unavailable", result: null };
  }
  return {
    ok: true,
    reason: "status_refreshed",
    result: {
      kind: "status",
      view: ctx.options.view,
      phoneJson: ctx.options.phoneJson,
      projection: viewPayload(loaded.value, ctx.options.view),
    },
  };
}

/**
 * One operator action against the loop. Writes never bypass the policy allowlists, and
 * AUTONOMY_MODE=off blocks everything except reading status.
 */
export async function executeControllerAction(
  options: ControllerActionOptions,
  deps: ControllerActionDeps,
): Promise<{ exitCode: number; report: ControllerActionReport }> {
  if (options.maxAttempts < 1) {
    throw new InputValidationError("--max-attempts must be >= 1");
  }
  const resolvedRepo = options.repo?.trim() || deps.config.repo;
  if (!resolvedRepo && options.action !== "refresh-status") {
    throw new InputValidationError("unable to resolve repository (pass --repo or set GITHUB_REPOSITORY)");
  }
  const logger = deps.logger ?? silentLogger;
  const eventLog = deps.eventLog ?? noopEventLog;
  const ctx: ActionContext = {
    options,
    deps,
    repo: resolvedRepo ?? "unknown/unknown",
    warnings: [],
    errors: [],
  };

  let outcome: Outcome;
  const action = options.action;
  if (!isControllerActionName(action)) {
    ctx.errors.push(`unsupported action: ${action}`);
    outcome = { ok: false, reason: "unsupported_action", result: null };
  } else {
    switch (action) {
      case "refresh-status":
        outcome = await refreshStatus(ctx);
        break;
      case "dispatch-report-only":
        outcome = await dispatchReportOnly(ctx);
        break;
      case "pause-loop":
        outcome = await setMode(ctx, action, "read-only");
        break;
      case "resume-loop":
        outcome = await setMode(ctx, action, "operate");
        break;
    }
  }

  const report: ControllerActionReport = {
    command: "controller-action",
    timestamp: isoTimestamp(deps.clock.now()),
    ok: outcome.ok,
    action,
    reason: outcome.reason,
    repo: ctx.repo,
    branch: options.branch,
    workflow: options.workflow,
    autonomyModeRuntime: deps.config.autonomyMode,
    dryRun: options.dryRun,
    result: outcome.result,
    warnings: ctx.warnings,
    errors: ctx.errors,
  };
  await eventLog.append({
    correlationId: `controller-action:${action}`,
    actor: deps.config.actor,
    eventType: "controller_action",
    summary: `${action} -> ${report.reason}${report.ok ? "" : " (failed)"}`,
    evidence: { ok: report.ok, reason: report.reason, repo: report.repo, dryRun: report.dryRun, errors: report.errors },
  });
  if (report.ok) {
    logger.info(`controller-action ${action}: ${report.reason}`);
  } else {
    logger.warn(`controller-action ${action}: ${report.reason}`);
  }
  return { exitCode: report.ok ? 0 : 1, report };
}

function describeValue(value: unknown) {
  if (value === null || value === undefined) {
    return "n/a";
  }
  return typeof value === "object" ? JSON.stringify(value) : String(value);
}

export function renderControllerActionMarkdown(report: ControllerActionReport) {
  const lines = ["# autoloop controller-action", ""];
  lines.push(`- ok: ${report.ok}`);
  lines.push(`- action: ${report.action}`);
  lines.push(`- reason: ${report.reason}`);
  lines.push(`- repo: ${report.repo}`);
  lines.push(`- branch: ${report.branch}`);
  lines.push(`- workflow: ${report.workflow || "n/a"}`);
  lines.push(`- autonomy_mode_runtime: ${report.autonomyModeRuntime}`);
  lines.push(`- dry_run: ${report.dryRun}`);
  if (report.result) {
    lines.push("", "## Result", "");
    const entries = Object.entries(report.result).toSorted(([a], [b]) => a.localeCompare(b));
    for (const [key, value] of entries) {
      lines.push(`- ${key}: ${describeValue(value)}`);
    }
  }
  if (report.warnings.length > 0) {
    lines.push("", "## Warnings", "", ...report.warnings.map((row) => `- ${row}`));
  }
  if (report.errors.length > 0) {
    lines.push("", "## Errors", "", ...report.errors.map((row) => `- ${row}`));
  }
  return lines.join("\n");
}
