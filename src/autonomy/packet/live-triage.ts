import path from "node:path";
import { isoTimestamp, type Clock } from "../../infra/clock.js";
import type { CommandRunner } from "../../process/exec.js";
import { collectProjectReport } from "../status/collect.js";
import {
  createCiRunsProbe,
  createGitStatusProbe,
  createMutationSummaryProbe,
  createDevLogProbe,
  DEFAULT_DEV_LOG_ROOT,
  DEFAULT_MUTATION_SUMMARY_PATH,
} from "../status/probes.js";
import { buildIssueRollup, buildNextActions, classifyIssues } from "../status/triage.js";
import type { ProjectProbes } from "../status/types.js";
import type { WorkflowClient } from "../workflow/types.js";
import type { SourceCandidate } from "./sources.js";

export const LIVE_TRIAGE_PATH = "<generated:live-triage>";

const LIVE_CI_RUN_LIMIT = 10;

/** Builds a triage source from whatever local status signals answer right now. */
export type LiveTriageBuilder = () => Promise<SourceCandidate>;

export function defaultLiveTriageProbes(params: {
  cwd: string;
  client?: WorkflowClient;
  run?: CommandRunner;
  /** Newest dev-log sessions to scan; 0 or unset leaves dev logs out. */
  devLogSessions?: number;
}): ProjectProbes {
  const devLogSessions = params.devLogSessions ?? 0;
  return {
    git: createGitStatusProbe({ cwd: params.cwd, run: params.run }),
    mutants: createMutationSummaryProbe({
      summaryPath: path.join(params.cwd, DEFAULT_MUTATION_SUMMARY_PATH),
    }),
    ...(params.client ? { ci: createCiRunsProbe({ client: params.client, limit: LIVE_CI_RUN_LIMIT }) } : {}),
    ...(devLogSessions > 0
      ? {
          devLogs: createDevLogProbe({
            root: path.join(params.cwd, DEFAULT_DEV_LOG_ROOT),
            sessionLimit: devLogSessions,
          }),
        }
      : {}),
  };
}

export function createLiveTriageBuilder(params: { probes: ProjectProbes; clock: Clock }): LiveTriageBuilder {
  return async () => {
    const now = params.clock.now();
    const timestamp = isoTimestamp(now);
    const report = await collectProjectReport({
      command: "loop-packet",
      timestamp,
      probes: params.probes,
      parallel: true,
    });
    const issues = classifyIssues(report);
    const rollup = buildIssueRollup(issues);
    return {
      path: LIVE_TRIAGE_PATH,
      body: {
        kind: "triage",
        total: rollup.total,
        high: rollup.bySeverity.high ?? 0,
        medium: rollup.bySeverity.medium ?? 0,
        nextActions: buildNextActions(issues),
      },
      rawTimestamp: timestamp,
      timestamp: new Date(now),
      mtimeMs: now,
    };
  };
}
