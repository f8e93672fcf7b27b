import type { WorkflowRun } from "../workflow/types.js";

export type ProbeOutcome<T> = { ok: true; value: T } | { ok: false; error: string };

export type GitChange = { status: string; path: string };

export type GitStatus = {
  branch: string;
  changes: GitChange[];
  changelogUpdated: boolean;
  planUpdated: boolean;
};

export type CiSummary = { runs: WorkflowRun[] };

export type MutationSummary = {
  /** Either a 0..1 ratio or a percentage, as the mutation tool wrote it. */
  score: number | null;
  outcomesPath: string | null;
  outcomesUpdatedAt: string | null;
};

export type DevLogSummary = {
  root: string;
  sessionFilesTotal: number;
  sessionsScanned: number;
  eventsScanned: number;
  errorEvents: number;
  parseErrors: number;
};

export type ProjectProbes = {
  git?: () => Promise<GitStatus>;
  mutants?: () => Promise<MutationSummary>;
  ci?: () => Promise<CiSummary>;
  devLogs?: () => Promise<DevLogSummary>;
};

export type ProjectReport = {
  command: string;
  timestamp: string;
  git?: ProbeOutcome<GitStatus>;
  mutants?: ProbeOutcome<MutationSummary>;
  ci?: ProbeOutcome<CiSummary>;
  devLogs?: ProbeOutcome<DevLogSummary>;
};

export type IssueSeverity = "high" | "medium" | "low";

export type IssueCategory = "infra" | "ci" | "quality" | "docs" | "governance";

export type TriageIssue = {
  category: IssueCategory;
  severity: IssueSeverity;
  source: string;
  summary: string;
};

export type IssueRollup = {
  total: number;
  bySeverity: Record<string, number>;
  byCategory: Record<string, number>;
};
