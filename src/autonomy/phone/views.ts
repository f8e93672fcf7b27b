import { publishDirectoryAtomic } from "../../infra/json-file.js";
import { truncateChars } from "../packet/risk.js";
import type { PhoneStatusPayload, PhoneView } from "../types.js";

export const DRAFT_PREVIEW_CHARS = 240;
const COMPACT_ACTIONS = 5;

export type CompactView = {
  schemaVersion: 1;
  view: "compact";
  phase: string;
  reason: string;
  planId: string;
  controllerRunId: string;
  branchBase: string;
  modeEffective: string;
  resolved: boolean;
  roundsCompleted: number;
  maxRounds: number;
  tasksCompleted: number;
  maxTasks: number;
  latestWorkingBranch: string;
  unresolvedCount: number;
  risk: string;
  sourceRunUrl: string;
  sourceRunId: number | null;
  sourceRunSha: string | null;
  traceLines: number;
  draftPreview: string;
  nextActions: string[];
  warningsCount: number;
  errorsCount: number;
};

export type TraceView = {
  schemaVersion: 1;
  view: "trace";
  controllerRunId: string;
  phase: string;
  reason: string;
  trace: string[];
  draftText: string;
  autoSend: boolean;
};

export type OperatorAction = {
  name: string;
  command: string;
  kind: "read" | "write";
  guard?: string;
};

export type ActionsView = {
  schemaVersion: 1;
  view: "actions";
  controllerRunId: string;
  phase: string;
  reason: string;
  nextActions: string[];
  operatorActions: OperatorAction[];
};

export type ViewPayload = PhoneStatusPayload | CompactView | TraceView | ActionsView;

export const OPERATOR_ACTIONS: readonly OperatorAction[] = [
  {
    name: "refresh-status",
    command: "autoloop phone-status --view compact --format md",
    kind: "read",
  },
  {
    name: "dispatch-report-only",
    command: "autoloop controller-action --action dispatch-report-only --format md",
    kind: "write",
    guard: "policy-gated",
  },
  {
    name: "controller-report",
    command: "autoloop controller-action --action refresh-status --view full --format md",
    kind: "read",
  },
];

function cleanLines(rows: readonly string[]) {
  return rows.map((row) => row.trim()).filter(Boolean);
}

export function compactView(payload: PhoneStatusPayload): CompactView {
  const { controller, loop, terminal, sourceRun } = payload;
  return {
    schemaVersion: 1,
    view: "compact",
    phase: payload.phase,
    reason: payload.reason || "unknown",
    planId: controller.planId,
    controllerRunId: controller.controllerRunId,
    branchBase: controller.branchBase,
    modeEffective: controller.modeEffective,
    resolved: controller.resolved,
    roundsCompleted: controller.roundsCompleted,
    maxRounds: controller.maxRounds,
    tasksCompleted: controller.tasksCompleted,
    maxTasks: controller.maxTasks,
    latestWorkingBranch: controller.latestWorkingBranch ?? "",
    unresolvedCount: loop.unresolvedCount,
    risk: loop.risk,
    sourceRunUrl: sourceRun.runUrl ?? "",
    sourceRunId: sourceRun.runId,
    sourceRunSha: sourceRun.runSha,
    traceLines: cleanLines(terminal.trace).length,
    draftPreview: truncateChars(terminal.draftText.trim(), DRAFT_PREVIEW_CHARS),
    nextActions: cleanLines(loop.nextActions).slice(0, COMPACT_ACTIONS),
    warningsCount: payload.warnings.length,
    errorsCount: payload.errors.length,
  };
}

export function traceView(payload: PhoneStatusPayload): TraceView {
  return {
    schemaVersion: 1,
    view: "trace",
    controllerRunId: payload.controller.controllerRunId,
    phase: payload.phase,
    reason: payload.reason || "unknown",
    trace: cleanLines(payload.terminal.trace),
    draftText: payload.terminal.draftText,
    autoSend: payload.terminal.autoSend,
  };
}

export function actionsView(payload: PhoneStatusPayload): ActionsView {
  return {
    schemaVersion: 1,
    view: "actions",
    controllerRunId: payload.controller.controllerRunId,
    phase: payload.phase,
    reason: payload.reason || "unknown",
    nextActions: cleanLines(payload.loop.nextActions),
    operatorActions: OPERATOR_ACTIONS.map((action) => ({ ...action })),
  };
}

export function viewPayload(payload: PhoneStatusPayload, view: PhoneView): ViewPayload {
  switch (view) {
    case "full":
      return payload;
    case "trace":
      return traceView(payload);
    case "actions":
      return actionsView(payload);
    case "compact":
      return compactView(payload);
  }
}

function bulletList(rows: readonly string[]) {
  return rows.length > 0 ? rows.map((row) => `- ${row}`) : ["- none"];
}

function renderCompact(view: CompactView) {
  return [
    "## Compact View",
    "",
    `- phase: ${view.phase}`,
    `- reason: ${view.reason}`,
    `- plan_id: ${view.planId}`,
    `- run_id: ${view.controllerRunId}`,
    `- branch: ${view.branchBase}`,
    `- mode: ${view.modeEffective}`,
    `- resolved: ${view.resolved}`,
    `- progress: rounds ${view.roundsCompleted}/${view.maxRounds} | tasks ${view.tasksCompleted}/${view.maxTasks}`,
    `- unresolved_count: ${view.unresolvedCount}`,
    `- risk: ${view.risk}`,
    `- source_run_url: ${view.sourceRunUrl || "n/a"}`,
    `- trace_lines: ${view.traceLines}`,
    "",
    "### Next Actions",
    "",
    ...bulletList(view.nextActions),
    "",
    "### Draft Preview",
    "",
    view.draftPreview || "(none)",
  ];
}

function renderTrace(view: TraceView) {
  return [
    "## Trace View",
    "",
    `- phase: ${view.phase}`,
    `- reason: ${view.reason}`,
    `- controller_run_id: ${view.controllerRunId}`,
    "",
    "### Terminal Trace",
    "",
    ...bulletList(view.trace),
    "",
    "### Draft",
    "",
    view.draftText || "(none)",
  ];
}

function renderActions(view: ActionsView) {
  return [
    "## Actions View",
    "",
    `- phase: ${view.phase}`,
    `- reason: ${view.reason}`,
    "",
    "### Loop Next Actions",
    "",
    ...bulletList(view.nextActions),
    "",
    "### Operator Actions",
    "",
    ...bulletList(
      view.operatorActions.map(
        (action) => `${action.name} (${action.kind}, guard=${action.guard ?? "none"}): \`${action.command}\``,
      ),
    ),
  ];
}

/** Full payloads render as their compact projection. */
export function renderViewMarkdown(value: ViewPayload) {
  if (!("view" in value)) {
    return renderCompact(compactView(value)).join("\n");
  }
  switch (value.view) {
    case "compact":
      return renderCompact(value).join("\n");
    case "trace":
      return renderTrace(value).join("\n");
    case "actions":
      return renderActions(value).join("\n");
  }
}

export type ProjectionFiles = {
  fullJson: string;
  compactJson: string;
  actionsJson: string;
  traceNdjson: string;
  latestMd: string;
};

/**
 * Persists every view of one payload as a single directory swap, so readers see either
 * the previous bundle or the new one in full.
 */
export async function writeProjectionBundle(dir: string, payload: PhoneStatusPayload): Promise<ProjectionFiles> {
  const compact = compactView(payload);
  const trace = traceView(payload);
  const traceRows = trace.trace.map((line, index) =>
    JSON.stringify({
      index: index + 1,
      line,
      controllerRunId: trace.controllerRunId,
      phase: trace.phase,
      reason: trace.reason,
    }),
  );
  const written = await publishDirectoryAtomic(dir, {
    "full.json": `${JSON.stringify(payload, null, 2)}\n`,
    "compact.json": `${JSON.stringify(compact, null, 2)}\n`,
    "actions.json": `${JSON.stringify(actionsView(payload), null, 2)}\n`,
    "trace.ndjson": traceRows.map((row) => `${row}\n`).join(""),
    "latest.md": `${renderCompact(compact).join("\n")}\n`,
  });
  const pick = (name: string) => written[name] ?? "";
  return {
    fullJson: pick("full.json"),
    compactJson: pick("compact.json"),
    actionsJson: pick("actions.json"),
    traceNdjson: pick("trace.ndjson"),
    latestMd: pick("latest.md"),
  };
}
