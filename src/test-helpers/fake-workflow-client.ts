import fs from "node:fs/promises";
import path from "node:path";
import type { WorkflowClient, WorkflowClientError, WorkflowRun } from "../autonomy/workflow/types.js";

export type FakeWorkflowCall = { method: keyof WorkflowClient; args: unknown[] };

export type FakeWorkflowClient = WorkflowClient & { calls: FakeWorkflowCall[] };

export function makeRun(overrides: Partial<WorkflowRun> & { id: number }): WorkflowRun {
  return {
    status: "completed",
    conclusion: "success",
    headSha: `sha${overrides.id}`,
    headBranch: "develop",
    url: `https://ci.example.test/runs/${overrides.id}`,
    createdAt: "2026-01-01T00:00:00Z",
    displayTitle: `run ${overrides.id}`,
    ...overrides,
  };
}

/**
 * In-memory WorkflowClient. `listRuns` answers are consumed in order, the last one
 * repeating; an entry that is an error is thrown for that call.
 */
export function createFakeWorkflowClient(params: {
  listRuns?: (WorkflowRun[] | WorkflowClientError)[];
  viewRuns?: Record<number, WorkflowRun | WorkflowClientError>;
  artifacts?: Record<number, Record<string, string> | WorkflowClientError>;
  dispatchError?: WorkflowClientError;
  setVariableError?: WorkflowClientError;
  upsertCommentError?: WorkflowClientError;
  connectivityError?: WorkflowClientError;
}): FakeWorkflowClient {
  const calls: FakeWorkflowCall[] = [];
  const listQueue = [...(params.listRuns ?? [[]])];

  return {
    calls,
    listRuns: async (query) => {
      calls.push({ method: "listRuns", args: [query] });
      const next = listQueue.length > 1 ? listQueue.shift() : listQueue[0];
      if (next instanceof Error) {
        throw next;
      }
      return next ?? [];
    },
    viewRun: async (runId) => {
      calls.push({ method: "viewRun", args: [runId] });
      const run = params.viewRuns?.[runId];
      if (!run) {
        throw new Error(`run ${runId} not found`);
      }
      if (run instanceof Error) {
        throw run;
      }
      return run;
    },
    downloadArtifacts: async (runId, destDir) => {
      calls.push({ method: "downloadArtifacts", args: [runId, destDir] });
      const files = params.artifacts?.[runId] ?? {};
      if (files instanceof Error) {
        throw files;
      }
      for (const [relative, content] of Object.entries(files)) {
        const target = path.join(destDir, relative);
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, content, "utf-8");
      }
    },
    dispatchWorkflow: async (request) => {
      calls.push({ method: "dispatchWorkflow", args: [request] });
      if (params.dispatchError) {
        throw params.dispatchError;
      }
      return "dispatched";
    },
    setVariable: async (request) => {
      calls.push({ method: "setVariable", args: [request] });
      if (params.setVariableError) {
        throw params.setVariableError;
      }
    },
    upsertComment: async (request) => {
      calls.push({ method: "upsertComment", args: [request] });
      if (params.upsertCommentError) {
        throw params.upsertCommentError;
      }
      return { id: 42, url: "https://ci.example.test/comments/42", action: "created" };
    },
    checkConnectivity: async () => {
      calls.push({ method: "checkConnectivity", args: [] });
      if (params.connectivityError) {
        throw params.connectivityError;
      }
    },
  };
}

export function backlogJson(items: number, extra: Record<string, unknown> = {}) {
  return JSON.stringify({
    items: Array.from({ length: items }, (_, index) => ({ id: `finding-${index + 1}` })),
    ...extra,
  });
}
