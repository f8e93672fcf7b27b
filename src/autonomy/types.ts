export type AutonomyMode = "off" | "read-only" | "operate";

export type LoopMode = "report-only" | "plan-then-fix" | "fix-only";

export type LoopBranchMode = "base" | "working";

export type RiskLevel = "low" | "medium" | "high";

export type SourceKind = "triage-loop" | "mutation-loop" | "triage";

export type NotifyMode = "summary-only" | "summary-and-comment";

export type CommentTarget = "auto" | "pr" | "commit";

export type SourceEvent = "workflow_dispatch" | "workflow_run";

export type AttemptStatus =
  | "analyzing-backlog"
  | "resolved"
  | "blocked"
  | "failed"
  | "waiting-for-new-run";

export type SourceCorrelation =
  | "pending"
  | "branch_latest_fallback"
  | "invalid_source_run_id"
  | "source_run_id_mismatch"
  | "source_run_sha_mismatch"
  | "source_run_validated"
  | "source_artifact_sha_validated"
  | "dry-run";

export type TriageReason =
  | "resolved"
  | "no fix command configured"
  | "fix_command_policy_blocked"
  | "timeout waiting for completed run"
  | "timeout waiting for new completed run"
  | "missing backlog file"
  | "invalid backlog format"
  | "artifact download failed"
  | "latest run missing id"
  | "fix command error"
  | "fix command failed"
  | "fix command timed out"
  | "max attempts reached with unresolved backlog"
  | "invalid source run id"
  | "source_run_id_mismatch"
  | "source_run_sha_mismatch"
  | "dry-run"
  | "gh_unreachable_local_non_blocking"
  | "notification_comment_failed";

/** Integrity violations: the controller stops on these regardless of remaining budget. */
export type HardReasonCode =
  | "source_run_sha_mismatch"
  | "source_run_id_mismatch"
  | "source_correlation_failed"
  | "notification_comment_failed";

export const HARD_REASON_CODES: ReadonlySet<string> = new Set<HardReasonCode>([
  "source_run_sha_mismatch",
  "source_run_id_mismatch",
  "source_correlation_failed",
  "notification_comment_failed",
]);

export function isHardReasonCode(reason: string): reason is HardReasonCode {
  return HARD_REASON_CODES.has(reason);
}

/** One polling cycle inside a triage loop; appended once and never edited. */
export type TriageAttempt = {
  attempt: number;
  runId: number;
  runSha: string;
  runUrl: string;
  runConclusion: string;
  status: AttemptStatus;
  message?: string;
  backlogCount?: number;
  backlogPrNumber?: number;
  backlogHeadSha?: string;
  fixExitCode?: number | null;
  sourceRunId?: number;
  sourceRunShaExpected?: string | null;
  sourceCorrelation?: SourceCorrelation;
};

export type TriageLoopResult = {
  ok: boolean;
  repo: string;
  branch: string;
  workflow: string;
  maxAttempts: number;
  completedAttempts: number;
  attempts: TriageAttempt[];
  unresolvedCount: number;
  reason: TriageReason;
  /** Human-readable detail behind `reason` (last poll error, exit code, ...). */
  detail?: string;
  fixCommandConfigured: boolean;
  fixBlockReason: string | null;
  escalationNeeded: boolean;
  sourceRunId: number | null;
  sourceRunSha: string | null;
  sourceEvent: SourceEvent;
  sourceCorrelation: SourceCorrelation;
  backlogPrNumber: number | null;
  backlogHeadSha: string | null;
  connectivityError?: string;
};

export type NotifyResult = {
  ok: boolean;
  mode: NotifyMode;
  skipped?: boolean;
  reason?: string;
  targetKind?: "pr" | "commit";
  targetId?: string;
  commentId?: number;
  commentUrl?: string;
  action?: "created" | "updated";
  error?: string;
};

export type ReportBundle =
  | { written: false }
  | { written: true; dir: string; markdown: string; json: string };

export type TriageReport = TriageLoopResult & {
  schemaVersion: 1;
  command: "triage-loop";
  timestamp: string;
  mode: LoopMode;
  notify: NotifyMode;
  commentTarget: CommentTarget;
  commentPrNumber: number | null;
  dryRun: boolean;
  fixCommandRequested: boolean;
  fixCommandEffective: boolean;
  warnings: string[];
  notifyResult?: NotifyResult;
  bundle: ReportBundle;
};

export type TerminalPacket = {
  packetId: string;
  sourceCommand: SourceKind;
  draftText: string;
  autoSend: boolean;
};

export type LoopPacket = {
  schemaVersion: 1;
  packetId: string;
  createdAt: string;
  channel: "terminal-draft";
  source: { command: SourceKind; path: string; timestamp: string };
  guard: {
    risk: RiskLevel;
    confidence: number;
    draftOnly: boolean;
    autoSendPermitted: boolean;
  };
  nextActions: string[];
  evidence: string[];
};

export type LoopPacketReady = {
  command: "loop-packet";
  timestamp: string;
  ok: true;
  reason: "packet_ready";
  sourceCommand: SourceKind;
  sourcePath: string;
  sourceTimestamp: string;
  freshnessHours: number;
  maxAgeHours: number;
  checkedPaths: string[];
  risk: RiskLevel;
  confidence: number;
  nextActions: string[];
  summary: string;
  warnings: string[];
  packet: LoopPacket;
  terminalPacket: TerminalPacket;
};

export type LoopPacketRejected = {
  command: "loop-packet";
  timestamp: string;
  ok: false;
  reason: "source_stale" | "source_timestamp_missing";
  sourceCommand: SourceKind;
  sourcePath: string;
  freshnessHours?: number;
  maxAgeHours: number;
  checkedPaths: string[];
  warnings: string[];
};

export type LoopPacketReport = LoopPacketReady | LoopPacketRejected;

export type CheckpointStatus = "pending" | "accepted" | "rejected";

/** Durable, replay-protected snapshot of one controller round. */
export type CheckpointPacket = {
  schemaVersion: 1;
  planId: string;
  controllerRunId: string;
  round: number;
  timestampUtc: string;
  source: "triage-loop";
  workingBranch: string;
  promotionBranch: string;
  risk: RiskLevel;
  requiresApproval: boolean;
  draftText: string;
  terminalPacket: TerminalPacket | null;
  proposedActions: string[];
  evidenceRefs: string[];
  idempotencyKey: string;
  nonce: string;
  expiresAtUtc: string;
  status: CheckpointStatus;
  reasonCode: string;
  unresolvedCount: number;
  terminalTrace: string[];
};

export type ControllerRound = {
  round: number;
  workingBranch: string;
  loopBranch: string;
  triageExitCode: number;
  packetExitCode: number;
  triageReason: string;
  unresolvedCount: number;
  risk: RiskLevel;
  packetPath: string;
  phoneStatusJson: string;
  requiresApproval: boolean;
};

export type BudgetReason = "max_rounds_reached" | "max_hours_reached" | "max_tasks_reached";

export type ControllerReason =
  | "resolved"
  | BudgetReason
  | "policy_denied"
  | HardReasonCode
  | "triage_report_missing"
  | "packet_report_missing"
  | "triage_loop_failed"
  | "loop_packet_failed";

export type ControllerReport = {
  command: "autonomy-loop";
  timestamp: string;
  ok: boolean;
  resolved: boolean;
  reason: ControllerReason;
  planId: string;
  controllerRunId: string | null;
  repo: string;
  branchBase: string;
  modeRequested: LoopMode;
  modeEffective: LoopMode;
  loopBranchMode: LoopBranchMode;
  maxRounds: number;
  maxHours: number;
  maxTasks: number;
  roundsCompleted: number;
  tasksCompleted: number;
  elapsedHours: number;
  packetRoot: string;
  queueRoot: string;
  latestPacket: string | null;
  latestWorkingBranch: string | null;
  phoneStatusLatestJson: string | null;
  phoneStatusLatestMd: string | null;
  phoneStatusFinalJson: string | null;
  phoneStatusFinalMd: string | null;
  summaryJson: string | null;
  summaryMd: string | null;
  warnings: string[];
  errors: string[];
  rounds: ControllerRound[];
};

export type PhonePhase = "running" | "paused" | "resolved" | "error";

export type PhoneStatusPayload = {
  schemaVersion: 1;
  command: "phone-status";
  timestamp: string;
  ok: boolean;
  phase: PhonePhase;
  reason: string;
  controller: {
    planId: string;
    controllerRunId: string;
    repo: string;
    branchBase: string;
    modeEffective: LoopMode;
    resolved: boolean;
    roundsCompleted: number;
    tasksCompleted: number;
    maxRounds: number;
    maxTasks: number;
    currentRound: number;
    latestWorkingBranch: string | null;
  };
  loop: {
    triageReason: string;
    unresolvedCount: number;
    risk: RiskLevel;
    nextActions: string[];
  };
  terminal: {
    trace: string[];
    draftText: string;
    autoSend: boolean;
  };
  sourceRun: {
    runId: number | null;
    runSha: string | null;
    runUrl: string | null;
    runConclusion: string | null;
    attemptStatus: AttemptStatus | null;
    attemptMessage: string | null;
  };
  warnings: string[];
  errors: string[];
};

export type PhoneView = "full" | "compact" | "trace" | "actions";

export type ControllerActionName =
  | "refresh-status"
  | "dispatch-report-only"
  | "pause-loop"
  | "resume-loop";

export type ControllerActionReason =
  | "dispatched_report_only"
  | "dispatch_failed"
  | "gh_unreachable_local_non_blocking"
  | "workflow_not_allowlisted"
  | "branch_not_allowlisted"
  | "autonomy_mode_off"
  | "mode_updated"
  | "mode_update_failed"
  | "status_refreshed"
  | "phone_status_unavailable"
  | "unsupported_action";
