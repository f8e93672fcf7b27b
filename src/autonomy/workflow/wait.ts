import type { Clock } from "../../infra/clock.js";
import { formatError } from "../../infra/errors.js";
import type { WorkflowClient, WorkflowRun } from "./types.js";

export type WaitBudget = {
  pollSeconds: number;
  timeoutSeconds: number;
};

export type WaitOutcome =
  | { ok: true; run: WorkflowRun }
  | {
      ok: false;
      reason: "timeout waiting for completed run" | "timeout waiting for new completed run";
      detail: string;
    };

async function latestRun(
  client: WorkflowClient,
  params: { workflow: string; branch: string; limit: number },
) {
  const runs = await client.listRuns(params);
  const [first] = runs;
  if (!first) {
    throw new Error("no workflow runs found");
  }
  return first;
}

/**
 * Polls `probe` until it yields a run or the deadline passes. Client errors are
 * remembered and retried within the same budget.
 */
async function pollUntil(
  clock: Clock,
  budget: WaitBudget,
  probe: () => Promise<WorkflowRun | undefined>,
  onError: (message: string) => void,
) {
  const deadline = clock.now() + budget.timeoutSeconds * 1000;
  while (clock.now() < deadline) {
    try {
      const run = await probe();
      if (run) {
        return run;
      }
    } catch (err) {
      onError(formatError(err));
    }
    await clock.sleep(budget.pollSeconds * 1000);
  }
  return undefined;
}

export async function waitForLatestCompleted(params: {
  client: WorkflowClient;
  clock: Clock;
  workflow: string;
  branch: string;
  limit: number;
  budget: WaitBudget;
}): Promise<WaitOutcome> {
  let lastError = "";
  const run = await pollUntil(
    params.clock,
    params.budget,
    async () => {
      const latest = await latestRun(params.client, params);
      return latest.status === "completed" ? latest : undefined;
    },
    (message) => {
      lastError = message;
    },
  );
  if (run) {
    return { ok: true, run };
  }
  return {
    ok: false,
    reason: "timeout waiting for completed run",
    detail: lastError || "no completed run yet",
  };
}

export async function waitForRunCompletedById(params: {
  client: WorkflowClient;
  clock: Clock;
  runId: number;
  budget: WaitBudget;
}): Promise<WaitOutcome> {
  let lastError = "";
  const run = await pollUntil(
    params.clock,
    params.budget,
    async () => {
      const viewed = await params.client.viewRun(params.runId);
      return viewed.status === "completed" ? viewed : undefined;
    },
    (message) => {
      lastError = message;
    },
  );
  if (run) {
    return { ok: true, run };
  }
  return {
    ok: false,
    reason: "timeout waiting for completed run",
    detail: `source run ${params.runId} did not complete (${lastError || "still running"})`,
  };
}

/** Waits for a completed run whose head commit differs from `previousSha`. */
export async function waitForNewCompletedRun(params: {
  client: WorkflowClient;
  clock: Clock;
  workflow: string;
  branch: string;
  limit: number;
  previousSha: string;
  budget: WaitBudget;
}): Promise<WaitOutcome> {
  let lastSeen = "";
  let lastError = "";
  const run = await pollUntil(
    params.clock,
    params.budget,
    async () => {
      const latest = await latestRun(params.client, params);
      if (latest.headSha) {
        lastSeen = latest.headSha;
      }
      const isNew = latest.headSha !== "" && latest.headSha !== params.previousSha;
      return isNew && latest.status === "completed" ? latest : undefined;
    },
    (message) => {
      lastError = message;
    },
  );
  if (run) {
    return { ok: true, run };
  }
  return {
    ok: false,
    reason: "timeout waiting for new completed run",
    detail: lastError
      ? `last_seen_sha=${lastSeen || params.previousSha}; last_error=${lastError}`
      : `last_seen_sha=${lastSeen || params.previousSha}`,
  };
}
