import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createRuntimeConfig } from "../../config/runtime-config.js";
import { createManualClock } from "../../infra/clock.js";
import { createDefaultControlPlanePolicy } from "../policy/runtime.js";
import { renderPhoneReportMarkdown, runPhoneStatus } from "./command.js";
import { buildPhoneStatus } from "./status.js";

const NOW = Date.UTC(2026, 3, 10, 9, 0, 0);

function samplePayload() {
  return buildPhoneStatus({
    now: NOW,
    planId: "nightly",
    controllerRunId: "0123456789ab",
    repo: "acme/widgets",
    branchBase: "develop",
    modeEffective: "report-only",
    reason: "resolved",
    resolved: true,
    roundsCompleted: 2,
    tasksCompleted: 2,
    maxRounds: 3,
    maxTasks: 10,
    currentRound: 2,
    latestWorkingBranch: "autoloop/nightly/0123456789ab/r002",
    triage: null,
    packet: null,
    checkpoint: null,
    warnings: [],
    errors: [],
    maxDraftChars: 400,
    maxTraceLines: 5,
  });
}

describe("runPhoneStatus", () => {
  let tmpDir = "";
  const policy = createDefaultControlPlanePolicy();

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "autoloop-phone-cmd-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function deps() {
    return { config: createRuntimeConfig({ env: {}, policy, cwd: tmpDir }), clock: createManualClock(NOW) };
  }

  it("projects the requested view and emits the bundle", async () => {
    await fs.writeFile(path.join(tmpDir, "latest.json"), JSON.stringify(samplePayload()), "utf-8");
    const { exitCode, report } = await runPhoneStatus(
      { phoneJson: "latest.json", view: "compact", emitProjections: "proj" },
      deps(),
    );

    expect(exitCode).toBe(0);
    expect(report.ok).toBe(true);
    expect(report.inputPath).toBe(path.join(tmpDir, "latest.json"));
    expect(report.viewPayload).toMatchObject({ view: "compact", phase: "resolved", roundsCompleted: 2 });
    expect(report.projectionDir).toBe(path.join(tmpDir, "proj"));
    expect(report.projectionFiles?.fullJson).toBe(path.join(tmpDir, "proj", "full.json"));

    const lines = renderPhoneReportMarkdown(report).split("\n");
    expect(lines[0]).toBe("# autoloop phone-status");
    expect(lines).toContain(`- projection_dir: ${path.join(tmpDir, "proj")}`);
    expect(lines).toContain("## Compact View");
  });

  it("reports a missing artifact", async () => {
    const { exitCode, report } = await runPhoneStatus({ phoneJson: "missing.json", view: "full" }, deps());
    expect(exitCode).toBe(1);
    expect(report.viewPayload).toBeNull();
    expect(report.errors).toEqual([`phone status artifact not found: ${path.join(tmpDir, "missing.json")}`]);
    expect(renderPhoneReportMarkdown(report).split("\n")).toContain("## Errors");
  });

  it("rejects non-object and malformed payloads", async () => {
    await fs.writeFile(path.join(tmpDir, "list.json"), "[1,2]", "utf-8");
    await fs.writeFile(path.join(tmpDir, "broken.json"), "{", "utf-8");
    await fs.writeFile(path.join(tmpDir, "partial.json"), JSON.stringify({ command: "phone-status" }), "utf-8");

    const list = await runPhoneStatus({ phoneJson: "list.json", view: "compact" }, deps());
    expect(list.report.errors).toEqual(["expected top-level object in phone status artifact"]);

    const broken = await runPhoneStatus({ phoneJson: "broken.json", view: "compact" }, deps());
    expect(broken.report.errors[0]?.startsWith("invalid json (")).toBe(true);

    const partial = await runPhoneStatus({ phoneJson: "partial.json", view: "compact", emitProjections: "p" }, deps());
    expect(partial.exitCode).toBe(1);
    expect(partial.report.errors[0]?.startsWith("malformed phone status artifact (")).toBe(true);
    expect(partial.report.projectionDir).toBeNull();
  });
});
