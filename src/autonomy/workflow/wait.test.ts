import { describe, expect, it } from "vitest";
import { createManualClock } from "../../infra/clock.js";
import { createFakeWorkflowClient, makeRun } from "../../test-helpers/fake-workflow-client.js";
import { WorkflowClientError } from "./types.js";
import { waitForLatestCompleted, waitForNewCompletedRun, waitForRunCompletedById } from "./wait.js";

const budget = { pollSeconds: 10, timeoutSeconds: 60 };

describe("workflow wait helpers", () => {
  it("retries client errors until a completed run shows up", async () => {
    const clock = createManualClock(0);
    const client = createFakeWorkflowClient({
      listRuns: [
        new WorkflowClientError("connectivity", "failed to connect"),
        [makeRun({ id: 7, status: "in_progress" })],
        [makeRun({ id: 7 })],
      ],
    });
    const outcome = await waitForLatestCompleted({
      client,
      clock,
      workflow: "triage",
      branch: "develop",
      limit: 5,
      budget,
    });
    expect(outcome).toEqual({ ok: true, run: makeRun({ id: 7 }) });
    expect(clock.now()).toBe(20_000);
  });

  it("times out with the last error as detail", async () => {
    const clock = createManualClock(0);
    const client = createFakeWorkflowClient({ listRuns: [[]] });
    const outcome = await waitForLatestCompleted({
      client,
      clock,
      workflow: "triage",
      branch: "develop",
      limit: 5,
      budget,
    });
    expect(outcome).toEqual({
      ok: false,
      reason: "timeout waiting for completed run",
      detail: "no workflow runs found",
    });
    expect(client.calls).toHaveLength(6);
  });

  it("waits for a specific run id", async () => {
    const clock = createManualClock(0);
    const client = createFakeWorkflowClient({
      viewRuns: { 11: makeRun({ id: 11, status: "queued" }) },
    });
    const outcome = await waitForRunCompletedById({ client, clock, runId: 11, budget });
    expect(outcome).toEqual({
      ok: false,
      reason: "timeout waiting for completed run",
      detail: "source run 11 did not complete (still running)",
    });
  });

  it("ignores completed runs for the previous head commit", async () => {
    const clock = createManualClock(0);
    const client = createFakeWorkflowClient({
      listRuns: [
        [makeRun({ id: 1, headSha: "aaa" })],
        [makeRun({ id: 2, headSha: "bbb", status: "in_progress" })],
        [makeRun({ id: 2, headSha: "bbb" })],
      ],
    });
    const outcome = await waitForNewCompletedRun({
      client,
      clock,
      workflow: "triage",
      branch: "develop",
      limit: 5,
      previousSha: "aaa",
      budget,
    });
    expect(outcome.ok && outcome.run.id).toBe(2);
  });

  it("reports the last seen sha when no new run completes", async () => {
    const clock = createManualClock(0);
    const client = createFakeWorkflowClient({
      listRuns: [[makeRun({ id: 2, headSha: "bbb", status: "in_progress" })]],
    });
    const outcome = await waitForNewCompletedRun({
      client,
      clock,
      workflow: "triage",
      branch: "develop",
      limit: 5,
      previousSha: "aaa",
      budget,
    });
    expect(outcome).toEqual({
      ok: false,
      reason: "timeout waiting for new completed run",
      detail: "last_seen_sha=bbb",
    });
  });
});
