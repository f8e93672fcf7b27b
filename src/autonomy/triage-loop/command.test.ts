import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createRuntimeConfig } from "../../config/runtime-config.js";
import { createManualClock } from "../../infra/clock.js";
import { InputValidationError } from "../../infra/errors.js";
import { backlogJson, createFakeWorkflowClient, makeRun } from "../../test-helpers/fake-workflow-client.js";
import { createDefaultControlPlanePolicy } from "../policy/runtime.js";
import { WorkflowClientError } from "../workflow/types.js";
import { runTriageLoop, type TriageLoopOptions } from "./command.js";

const BACKLOG = "triage-report/backlog-medium.json";
const policy = createDefaultControlPlanePolicy({ allowedFixCommandPrefixes: [["make", "fix"]] });

function options(overrides: Partial<TriageLoopOptions> = {}): TriageLoopOptions {
  return {
    repo: "acme/widgets",
    branch: "develop",
    workflow: "Backlog Triage",
    mode: "report-only",
    maxAttempts: 2,
    runListLimit: 5,
    pollSeconds: 10,
    timeoutSeconds: 60,
    sourceEvent: "workflow_dispatch",
    notify: "summary-only",
    commentTarget: "auto",
    dryRun: false,
    emitBundle: false,
    bundleDir: "bundle",
    bundlePrefix: "triage-loop",
    ...overrides,
  };
}

describe("runTriageLoop", () => {
  let tmpDir = "";

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "autoloop-triage-cmd-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function config(env: Record<string, string> = {}) {
    return createRuntimeConfig({ env: { AUTONOMY_MODE: "operate", ...env }, policy, cwd: tmpDir });
  }

  it("rejects invalid flags before touching the client", async () => {
    const client = createFakeWorkflowClient({});
    const deps = { config: config(), policy, client, clock: createManualClock(0) };
    await expect(runTriageLoop(options({ maxAttempts: 0 }), deps)).rejects.toThrow(
      "--max-attempts must be >= 1",
    );
    await expect(runTriageLoop(options({ pollSeconds: 1 }), deps)).rejects.toBeInstanceOf(
      InputValidationError,
    );
    await expect(
      runTriageLoop(options({ sourceEvent: "workflow_run" }), deps),
    ).rejects.toThrow("--source-event workflow_run requires --source-run-id");
    await expect(runTriageLoop(options({ repo: "" }), deps)).rejects.toThrow(
      "unable to resolve repository",
    );
    expect(client.calls).toEqual([]);
  });

  it("produces a dry-run report without remote calls", async () => {
    const client = createFakeWorkflowClient({});
    const { exitCode, report } = await runTriageLoop(
      options({ dryRun: true, mode: "fix-only", fixCommand: "make fix", sourceRunSha: "ABC" }),
      { config: config(), policy, client, clock: createManualClock(Date.UTC(2026, 0, 2)) },
    );
    expect(exitCode).toBe(0);
    expect(report).toMatchObject({
      ok: true,
      command: "triage-loop",
      reason: "dry-run",
      sourceCorrelation: "dry-run",
      sourceRunSha: "abc",
      timestamp: "2026-01-02T00:00:00.000Z",
      fixCommandRequested: true,
      fixCommandEffective: true,
      notifyResult: { ok: true, mode: "summary-only", skipped: true },
    });
    expect(client.calls).toEqual([]);
  });

  it("warns when a fixing mode has no fix command and ignores the command in report-only mode", async () => {
    const client = createFakeWorkflowClient({ listRuns: [[makeRun({ id: 1 })]] });
    const deps = { config: config(), policy, client, clock: createManualClock(0) };
    const planned = await runTriageLoop(options({ dryRun: true, mode: "plan-then-fix" }), deps);
    expect(planned.report.warnings).toEqual([
      "mode=plan-then-fix requested but no --fix-command configured; backlog can only be reported.",
    ]);
    const reportOnly = await runTriageLoop(options({ dryRun: true, fixCommand: "make fix" }), deps);
    expect(reportOnly.report.fixCommandRequested).toBe(true);
    expect(reportOnly.report.fixCommandEffective).toBe(false);
    expect(reportOnly.report.warnings).toEqual([]);
  });

  it("blocks fix execution outside operate mode", async () => {
    const client = createFakeWorkflowClient({
      listRuns: [[makeRun({ id: 1 })]],
      artifacts: { 1: { [BACKLOG]: backlogJson(2) } },
    });
    const { exitCode, report } = await runTriageLoop(
      options({ mode: "fix-only", fixCommand: "make fix" }),
      { config: config({ AUTONOMY_MODE: "read-only" }), policy, client, clock: createManualClock(0) },
    );
    expect(exitCode).toBe(1);
    expect(report.reason).toBe("fix_command_policy_blocked");
    expect(report.fixBlockReason).toBe(
      "AUTONOMY_MODE=read-only blocks triage-loop fix execution (requires operate)",
    );
    expect(report.warnings).toContain(
      "AUTONOMY_MODE=read-only blocks triage-loop fix execution (requires operate)",
    );
  });

  it("treats an unreachable API on a developer machine as non-blocking", async () => {
    const client = createFakeWorkflowClient({
      connectivityError: new WorkflowClientError("connectivity", "error connecting to api.github.com"),
    });
    const { exitCode, report } = await runTriageLoop(options({ notify: "summary-and-comment" }), {
      config: config(),
      policy,
      client,
      clock: createManualClock(0),
    });
    expect(exitCode).toBe(0);
    expect(report.reason).toBe("gh_unreachable_local_non_blocking");
    expect(report.connectivityError).toBe("error connecting to api.github.com");
    expect(report.notifyResult).toEqual({
      ok: true,
      mode: "summary-and-comment",
      skipped: true,
      reason: "gh_unreachable_local_non_blocking",
    });
    expect(client.calls.map((call) => call.method)).toEqual(["checkConnectivity"]);
  });

  it("keeps polling under CI even when the preflight fails", async () => {
    const client = createFakeWorkflowClient({
      connectivityError: new WorkflowClientError("connectivity", "error connecting to api.github.com"),
      listRuns: [[makeRun({ id: 1 })]],
      artifacts: { 1: { [BACKLOG]: backlogJson(0) } },
    });
    const { exitCode, report } = await runTriageLoop(options(), {
      config: config({ CI: "true" }),
      policy,
      client,
      clock: createManualClock(0),
    });
    expect(exitCode).toBe(0);
    expect(report.reason).toBe("resolved");
  });

  it("publishes a marker comment on the backlog pull request", async () => {
    const client = createFakeWorkflowClient({
      listRuns: [[makeRun({ id: 1 })]],
      artifacts: { 1: { [BACKLOG]: backlogJson(0, { pr_number: 12 }) } },
    });
    const { report } = await runTriageLoop(options({ notify: "summary-and-comment" }), {
      config: config(),
      policy,
      client,
      clock: createManualClock(0),
    });
    expect(report.notifyResult).toEqual({
      ok: true,
      mode: "summary-and-comment",
      targetKind: "pr",
      targetId: "12",
      commentId: 42,
      commentUrl: "https://ci.example.test/comments/42",
      action: "created",
    });
    const upsert = client.calls.find((call) => call.method === "upsertComment");
    expect(upsert?.args[0]).toMatchObject({
      target: { kind: "pr", id: 12 },
      marker: "<!-- autoloop:target=pr:12;run_id=none;sha=sha1 -->",
    });
  });

  it("fails the report when the comment cannot be published", async () => {
    const client = createFakeWorkflowClient({
      listRuns: [[makeRun({ id: 1 })]],
      artifacts: { 1: { [BACKLOG]: backlogJson(0) } },
      upsertCommentError: new WorkflowClientError("command_failed", "HTTP 403"),
    });
    const { exitCode, report } = await runTriageLoop(options({ notify: "summary-and-comment" }), {
      config: config(),
      policy,
      client,
      clock: createManualClock(0),
    });
    expect(exitCode).toBe(1);
    expect(report.reason).toBe("notification_comment_failed");
    expect(report.warnings).toEqual([
      "summary-and-comment requested but comment publication failed: HTTP 403",
    ]);
  });

  it("writes a markdown and json bundle", async () => {
    const client = createFakeWorkflowClient({
      listRuns: [[makeRun({ id: 1 })]],
      artifacts: { 1: { [BACKLOG]: backlogJson(0) } },
    });
    const { report } = await runTriageLoop(options({ emitBundle: true }), {
      config: config(),
      policy,
      client,
      clock: createManualClock(0),
    });
    const dir = path.join(tmpDir, "bundle");
    expect(report.bundle).toEqual({
      written: true,
      dir,
      markdown: path.join(dir, "triage-loop.md"),
      json: path.join(dir, "triage-loop.json"),
    });
    const persisted: unknown = JSON.parse(await fs.readFile(path.join(dir, "triage-loop.json"), "utf-8"));
    expect(persisted).toMatchObject({ reason: "resolved", bundle: { written: true } });
    const markdown = await fs.readFile(path.join(dir, "triage-loop.md"), "utf-8");
    expect(markdown.split("\n")[0]).toBe("# autoloop triage-loop");
    expect(markdown).toContain("- #1 run=1 sha=sha1 conclusion=success status=resolved backlog=0: medium+ backlog is empty");
  });
});
