import fs from "node:fs/promises";
import { z } from "zod";
import { formatError } from "../../infra/errors.js";
import { runCommandWithTimeout, type CommandResult, type CommandRunner } from "../../process/exec.js";
import { looksLikeConnectivityError } from "./connectivity.js";
import {
  WorkflowClientError,
  type CommentTargetRef,
  type UpsertCommentResult,
  type WorkflowClient,
  type WorkflowRun,
} from "./types.js";

const RUN_FIELDS = "databaseId,status,conclusion,headSha,headBranch,url,createdAt,displayTitle";
const DEFAULT_GH_TIMEOUT_MS = 120_000;

const ghRunSchema = z.object({
  databaseId: z.number().int().nullish(),
  status: z.string().nullish(),
  conclusion: z.string().nullish(),
  headSha: z.string().nullish(),
  headBranch: z.string().nullish(),
  url: z.string().nullish(),
  createdAt: z.string().nullish(),
  displayTitle: z.string().nullish(),
});

const ghCommentSchema = z.object({
  id: z.number().int().nullish(),
  body: z.string().nullish(),
  html_url: z.string().nullish(),
});

function toWorkflowRun(raw: z.infer<typeof ghRunSchema>): WorkflowRun {
  return {
    id: raw.databaseId ?? 0,
    status: (raw.status ?? "").trim().toLowerCase(),
    conclusion: (raw.conclusion ?? "").trim().toLowerCase(),
    headSha: (raw.headSha ?? "").trim().toLowerCase(),
    headBranch: (raw.headBranch ?? "").trim(),
    url: (raw.url ?? "").trim(),
    createdAt: (raw.createdAt ?? "").trim(),
    displayTitle: (raw.displayTitle ?? "").trim(),
  };
}

function classifyFailure(message: string) {
  if (looksLikeConnectivityError(message)) {
    return "connectivity" as const;
  }
  if (/\b(404|not found|could not find)\b/i.test(message)) {
    return "not_found" as const;
  }
  return "command_failed" as const;
}

function decode<S extends z.ZodTypeAny>(schema: S, raw: string, label: string): z.infer<S> {
  let json: unknown;
  try {
    json = JSON.parse(raw || "null");
  } catch (err) {
    throw new WorkflowClientError("malformed", `invalid json from gh ${label} (${formatError(err)})`);
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new WorkflowClientError("malformed", `unexpected gh ${label} payload`);
  }
  return parsed.data;
}

export function buildDispatchArgv(params: {
  repo: string;
  workflow: string;
  ref: string;
  inputs: Record<string, string>;
}) {
  const argv = ["gh", "workflow", "run", params.workflow, "--repo", params.repo, "--ref", params.ref];
  for (const [key, value] of Object.entries(params.inputs)) {
    argv.push("-f", `${key}=${value}`);
  }
  return argv;
}

export function buildSetVariableArgv(params: { repo: string; name: string; value: string }) {
  return ["gh", "variable", "set", params.name, "--repo", params.repo, "--body", params.value];
}

/** {@link WorkflowClient} backed by the `gh` CLI, invoked without a shell. */
export function createGhWorkflowClient(params: {
  repo: string;
  cwd: string;
  run?: CommandRunner;
  timeoutMs?: number;
}): WorkflowClient {
  const run = params.run ?? runCommandWithTimeout;
  const timeoutMs = params.timeoutMs ?? DEFAULT_GH_TIMEOUT_MS;
  const repo = params.repo;

  async function gh(argv: string[]) {
    let result: CommandResult;
    try {
      result = await run(["gh", ...argv], { cwd: params.cwd, timeoutMs });
    } catch (err) {
      throw new WorkflowClientError("command_failed", `unable to launch gh: ${formatError(err)}`);
    }
    if (result.killed) {
      throw new WorkflowClientError("command_failed", `gh ${argv[0] ?? ""} timed out`);
    }
    if (result.code !== 0) {
      const message = (result.stderr || result.stdout || `gh ${argv[0] ?? ""} failed`).trim();
      throw new WorkflowClientError(classifyFailure(message), message);
    }
    return result.stdout;
  }

  function commentsEndpoint(target: CommentTargetRef) {
    return target.kind === "pr"
      ? `/repos/${repo}/issues/${target.id}/comments`
      : `/repos/${repo}/commits/${target.id}/comments`;
  }

  function commentEndpoint(target: CommentTargetRef, commentId: number) {
    return target.kind === "pr"
      ? `/repos/${repo}/issues/comments/${commentId}`
      : `/repos/${repo}/comments/${commentId}`;
  }

  return {
    listRuns: async ({ workflow, branch, limit }) => {
      const argv = ["run", "list", "--limit", String(limit), "--json", RUN_FIELDS, "--repo", repo];
      if (workflow) {
        argv.push("--workflow", workflow);
      }
      if (branch) {
        argv.push("--branch", branch);
      }
      const rows = decode(z.array(ghRunSchema), await gh(argv), "run list");
      return rows.map(toWorkflowRun);
    },
    viewRun: async (runId) => {
      const stdout = await gh(["run", "view", String(runId), "--json", RUN_FIELDS, "--repo", repo]);
      return toWorkflowRun(decode(ghRunSchema, stdout, "run view"));
    },
    downloadArtifacts: async (runId, destDir) => {
      await fs.mkdir(destDir, { recursive: true });
      await gh(["run", "download", String(runId), "--dir", destDir, "--repo", repo]);
    },
    dispatchWorkflow: async ({ workflow, ref, inputs }) => {
      const [, ...argv] = buildDispatchArgv({ repo, workflow, ref, inputs });
      return (await gh(argv)).trim();
    },
    setVariable: async ({ name, value }) => {
      const [, ...argv] = buildSetVariableArgv({ repo, name, value });
      await gh(argv);
    },
    upsertComment: async ({ target, marker, body }): Promise<UpsertCommentResult> => {
      const comments = decode(
        z.array(ghCommentSchema),
        await gh(["api", `${commentsEndpoint(target)}?per_page=100`]),
        "comments",
      );
      const existing = comments.filter((row) => (row.body ?? "").includes(marker)).at(-1);
      if (existing) {
        if (typeof existing.id !== "number") {
          throw new WorkflowClientError("malformed", "existing marker comment missing numeric id");
        }
        const stdout = await gh([
          "api",
          "--method",
          "PATCH",
          commentEndpoint(target, existing.id),
          "-f",
          `body=${body}`,
        ]);
        const updated = decode(ghCommentSchema, stdout || "{}", "comment update");
        return { id: updated.id ?? existing.id, url: updated.html_url ?? null, action: "updated" };
      }
      const stdout = await gh([
        "api",
        "--method",
        "POST",
        commentsEndpoint(target),
        "-f",
        `body=${body}`,
      ]);
      const created = decode(ghCommentSchema, stdout || "{}", "comment create");
      return { id: created.id ?? null, url: created.html_url ?? null, action: "created" };
    },
    checkConnectivity: async () => {
      await gh(["api", "rate_limit", "--jq", ".resources.core.remaining"]);
    },
  };
}
