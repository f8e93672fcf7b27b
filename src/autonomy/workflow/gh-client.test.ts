import { describe, expect, it, vi } from "vitest";
import type { CommandOptions, CommandResult } from "../../process/exec.js";
import { isNonBlockingLocalConnectivityError, looksLikeConnectivityError } from "./connectivity.js";
import { buildDispatchArgv, createGhWorkflowClient } from "./gh-client.js";
import { WorkflowClientError } from "./types.js";

function result(overrides: Partial<CommandResult>): CommandResult {
  return { code: 0, signal: null, killed: false, stdout: "", stderr: "", ...overrides };
}

describe("gh workflow client", () => {
  it("lists runs through gh without a shell and normalizes fields", async () => {
    const run = vi.fn(async (_argv: string[], _options: CommandOptions) =>
      result({
        stdout: JSON.stringify([
          { databaseId: 5, status: "COMPLETED", conclusion: "success", headSha: "ABC", url: "u" },
        ]),
      }),
    );
    const client = createGhWorkflowClient({ repo: "acme/widgets", cwd: "/repo", run });
    const runs = await client.listRuns({ workflow: "triage", branch: "develop", limit: 3 });
    expect(runs).toEqual([
      {
        id: 5,
        status: "completed",
        conclusion: "success",
        headSha: "abc",
        headBranch: "",
        url: "u",
        createdAt: "",
        displayTitle: "",
      },
    ]);
    expect(run.mock.calls[0]?.[0]).toEqual([
      "gh",
      "run",
      "list",
      "--limit",
      "3",
      "--json",
      "databaseId,status,conclusion,headSha,headBranch,url,createdAt,displayTitle",
      "--repo",
      "acme/widgets",
      "--workflow",
      "triage",
      "--branch",
      "develop",
    ]);
  });

  it("classifies failures by kind", async () => {
    const outputs: CommandResult[] = [
      result({ code: 1, stderr: "error connecting to api.github.com" }),
      result({ code: 1, stderr: "HTTP 404: Not Found" }),
      result({ stdout: "{oops" }),
      result({ code: 1, stderr: "permission denied" }),
    ];
    const client = createGhWorkflowClient({
      repo: "acme/widgets",
      cwd: "/repo",
      run: async () => outputs.shift() ?? result({}),
    });
    const kinds: string[] = [];
    for (let index = 0; index < 4; index += 1) {
      try {
        await client.viewRun(1);
      } catch (err) {
        if (err instanceof WorkflowClientError) {
          kinds.push(err.kind);
        }
      }
    }
    expect(kinds).toEqual(["connectivity", "not_found", "malformed", "command_failed"]);
  });

  it("updates an existing marker comment instead of posting a new one", async () => {
    const run = vi.fn(async (argv: string[], _options: CommandOptions) => {
      if (argv.includes("PATCH")) {
        return result({ stdout: JSON.stringify({ id: 9, html_url: "https://example.test/c/9" }) });
      }
      return result({
        stdout: JSON.stringify([
          { id: 3, body: "unrelated" },
          { id: 9, body: "<!-- marker --> old" },
        ]),
      });
    });
    const client = createGhWorkflowClient({ repo: "acme/widgets", cwd: "/repo", run });
    const outcome = await client.upsertComment({
      target: { kind: "pr", id: 12 },
      marker: "<!-- marker -->",
      body: "<!-- marker --> new",
    });
    expect(outcome).toEqual({ id: 9, url: "https://example.test/c/9", action: "updated" });
    expect(run.mock.calls[1]?.[0]).toEqual([
      "gh",
      "api",
      "--method",
      "PATCH",
      "/repos/acme/widgets/issues/comments/9",
      "-f",
      "body=<!-- marker --> new",
    ]);
  });

  it("builds dispatch argv with inputs as fields", () => {
    expect(
      buildDispatchArgv({
        repo: "acme/widgets",
        workflow: ".github/workflows/triage.yml",
        ref: "develop",
        inputs: { branch: "develop", execution_mode: "report-only" },
      }),
    ).toEqual([
      "gh",
      "workflow",
      "run",
      ".github/workflows/triage.yml",
      "--repo",
      "acme/widgets",
      "--ref",
      "develop",
      "-f",
      "branch=develop",
      "-f",
      "execution_mode=report-only",
    ]);
  });
});

describe("connectivity hints", () => {
  it("matches known local network failures case-insensitively", () => {
    expect(looksLikeConnectivityError("Network is unreachable")).toBe(true);
    expect(looksLikeConnectivityError("HTTP 403")).toBe(false);
  });

  it("is non-blocking only outside CI", () => {
    const message = "failed to connect to host";
    expect(isNonBlockingLocalConnectivityError(message, { ciEnvironment: false })).toBe(true);
    expect(isNonBlockingLocalConnectivityError(message, { ciEnvironment: true })).toBe(false);
    expect(isNonBlockingLocalConnectivityError("", { ciEnvironment: false })).toBe(false);
  });
});
