import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { runCommandWithTimeout, type CommandRunner } from "../../process/exec.js";
import type { WorkflowClient } from "../workflow/types.js";
import type { CiSummary, DevLogSummary, GitChange, GitStatus, MutationSummary } from "./types.js";

export const DEFAULT_CHANGELOG_PATH = "CHANGELOG.md";
export const DEFAULT_PLAN_PATH = "docs/PLAN.md";
export const DEFAULT_MUTATION_SUMMARY_PATH = ".autoloop/mutation-summary.json";
export const DEFAULT_DEV_LOG_ROOT = ".autoloop/dev";

const GIT_TIMEOUT_MS = 30_000;

/** Parses `git status --porcelain` output; renames report their destination path. */
export function parsePorcelainStatus(raw: string): GitChange[] {
  const changes: GitChange[] = [];
  for (const line of raw.split("\n")) {
    if (!line.trim()) {
      continue;
    }
    let filePath = line.slice(3);
    if (filePath.includes("->")) {
      filePath = filePath.split("->").at(-1)?.trim() ?? filePath;
    }
    changes.push({ status: line.slice(0, 2).trim(), path: filePath });
  }
  return changes;
}

export function createGitStatusProbe(params: {
  cwd: string;
  run?: CommandRunner;
  changelogPath?: string;
  planPath?: string;
}) {
  const run = params.run ?? runCommandWithTimeout;
  const git = async (args: string[]) => {
    const result = await run(["git", ...args], { cwd: params.cwd, timeoutMs: GIT_TIMEOUT_MS });
    if (result.code !== 0) {
      throw new Error(`git failed: ${(result.stderr || result.stdout).trim() || `exit ${result.code}`}`);
    }
    return result.stdout;
  };
  return async (): Promise<GitStatus> => {
    const branch = (await git(["rev-parse", "--abbrev-ref", "HEAD"])).trim();
    const changes = parsePorcelainStatus(await git(["status", "--porcelain"]));
    const changed = new Set(changes.map((change) => change.path));
    return {
      branch,
      changes,
      changelogUpdated: changed.has(params.changelogPath ?? DEFAULT_CHANGELOG_PATH),
      planUpdated: changed.has(params.planPath ?? DEFAULT_PLAN_PATH),
    };
  };
}

export function createCiRunsProbe(params: { client: WorkflowClient; limit: number }) {
  return async (): Promise<CiSummary> => ({ runs: await params.client.listRuns({ limit: params.limit }) });
}

const mutationSummarySchema = z.object({
  score: z.number().nullish(),
  outcomes_path: z.string().nullish(),
  outcomes_updated_at: z.string().nullish(),
});

export function createMutationSummaryProbe(params: { summaryPath: string }) {
  return async (): Promise<MutationSummary> => {
    const raw = await fs.readFile(params.summaryPath, "utf-8");
    const parsed = mutationSummarySchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`mutation summary malformed: ${params.summaryPath}`);
    }
    return {
      score: parsed.data.score ?? null,
      outcomesPath: parsed.data.outcomes_path ?? null,
      outcomesUpdatedAt: parsed.data.outcomes_updated_at ?? null,
    };
  };
}

/** Scans the newest `sessions/*.jsonl` files under `root`; events of kind `error` are counted. */
export function createDevLogProbe(params: { root: string; sessionLimit: number }) {
  return async (): Promise<DevLogSummary> => {
    const sessionsDir = path.join(params.root, "sessions");
    const summary: DevLogSummary = {
      root: params.root,
      sessionFilesTotal: 0,
      sessionsScanned: 0,
      eventsScanned: 0,
      errorEvents: 0,
      parseErrors: 0,
    };
    let names: string[];
    try {
      names = await fs.readdir(sessionsDir);
    } catch {
      return summary;
    }
    const files = names.filter((name) => name.endsWith(".jsonl")).toSorted().toReversed();
    summary.sessionFilesTotal = files.length;
    const scanned = files.slice(0, Math.max(1, params.sessionLimit));
    summary.sessionsScanned = scanned.length;
    for (const name of scanned) {
      const raw = await fs.readFile(path.join(sessionsDir, name), "utf-8");
      for (const line of raw.split("\n")) {
        if (!line.trim()) {
          continue;
        }
        summary.eventsScanned += 1;
        let event: unknown;
        try {
          event = JSON.parse(line);
        } catch {
          summary.parseErrors += 1;
          continue;
        }
        if (typeof event !== "object" || event === null || Array.isArray(event)) {
          summary.parseErrors += 1;
          continue;
        }
        if ("kind" in event && String(event.kind).trim().toLowerCase() === "error") {
          summary.errorEvents += 1;
        }
      }
    }
    return summary;
  };
}
