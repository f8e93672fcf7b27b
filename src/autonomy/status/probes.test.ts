import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { CommandOptions, CommandResult } from "../../process/exec.js";
import {
  createDevLogProbe,
  createGitStatusProbe,
  createMutationSummaryProbe,
  parsePorcelainStatus,
} from "./probes.js";

function ok(stdout: string): CommandResult {
  return { code: 0, signal: null, killed: false, stdout, stderr: "" };
}

describe("status probes", () => {
  let tmpDir = "";

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "autoloop-probes-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("parses porcelain lines including renames", () => {
    expect(parsePorcelainStatus(" M src/a.ts\nR  old.ts -> new.ts\n?? CHANGELOG.md\n")).toEqual([
      { status: "M", path: "src/a.ts" },
      { status: "R", path: "new.ts" },
      { status: "??", path: "CHANGELOG.md" },
    ]);
  });

  it("reports branch and tracked document updates from git", async () => {
    const run = async (argv: string[], _options: CommandOptions) =>
      argv.includes("rev-parse") ? ok("develop\n") : ok(" M CHANGELOG.md\n M src/a.ts\n");
    const status = await createGitStatusProbe({ cwd: tmpDir, run })();
    expect(status).toEqual({
      branch: "develop",
      changes: [
        { status: "M", path: "CHANGELOG.md" },
        { status: "M", path: "src/a.ts" },
      ],
      changelogUpdated: true,
      planUpdated: false,
    });
  });

  it("throws when git fails so the collector records the error", async () => {
    const run = async () => ({ ...ok(""), code: 128, stderr: "not a git repository" });
    await expect(createGitStatusProbe({ cwd: tmpDir, run })()).rejects.toThrow(
      "git failed: not a git repository",
    );
  });

  it("reads the mutation summary", async () => {
    const summaryPath = path.join(tmpDir, "summary.json");
    await fs.writeFile(summaryPath, JSON.stringify({ score: 0.82, outcomes_path: "out/outcomes.json" }));
    expect(await createMutationSummaryProbe({ summaryPath })()).toEqual({
      score: 0.82,
      outcomesPath: "out/outcomes.json",
      outcomesUpdatedAt: null,
    });
  });

  it("scans the newest dev log sessions", async () => {
    const sessions = path.join(tmpDir, "sessions");
    await fs.mkdir(sessions, { recursive: true });
    await fs.writeFile(path.join(sessions, "2026-01-01.jsonl"), '{"kind":"error"}\n');
    await fs.writeFile(
      path.join(sessions, "2026-01-02.jsonl"),
      '{"kind":"transcript"}\n{"kind":"ERROR"}\nnot json\n',
    );
    const summary = await createDevLogProbe({ root: tmpDir, sessionLimit: 1 })();
    expect(summary).toEqual({
      root: tmpDir,
      sessionFilesTotal: 2,
      sessionsScanned: 1,
      eventsScanned: 3,
      errorEvents: 1,
      parseErrors: 1,
    });
  });
});
