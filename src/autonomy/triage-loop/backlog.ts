import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { formatError } from "../../infra/errors.js";

export const BACKLOG_FILE_NAME = "backlog-medium.json";

const backlogSchema = z.object({
  items: z.array(z.unknown()).default([]),
  pr_number: z.unknown().optional(),
  head_sha: z.unknown().optional(),
});

export type Backlog = {
  path: string;
  items: Record<string, unknown>[];
  prNumber: number | null;
  headSha: string | null;
};

export type BacklogLoadResult =
  | { ok: true; backlog: Backlog }
  | { ok: false; reason: "missing backlog file" | "invalid backlog format"; message: string };

export function normalizeSha(value: unknown) {
  return typeof value === "string" ? value.trim().toLowerCase() : "";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** First `backlog-medium.json` under `root` in sorted relative-path order. */
export async function findBacklogFile(root: string) {
  let entries: string[];
  try {
    entries = await fs.readdir(root, { recursive: true });
  } catch {
    return undefined;
  }
  const match = entries
    .filter((entry) => path.basename(entry) === BACKLOG_FILE_NAME)
    .toSorted()
    .at(0);
  return match ? path.join(root, match) : undefined;
}

export async function loadBacklog(root: string): Promise<BacklogLoadResult> {
  const file = await findBacklogFile(root);
  if (!file) {
    return {
      ok: false,
      reason: "missing backlog file",
      message: `missing ${BACKLOG_FILE_NAME} in downloaded artifacts`,
    };
  }
  let json: unknown;
  try {
    json = JSON.parse(await fs.readFile(file, "utf-8"));
  } catch (err) {
    return { ok: false, reason: "invalid backlog format", message: `invalid json (${formatError(err)})` };
  }
  if (!isRecord(json)) {
    return { ok: false, reason: "invalid backlog format", message: "backlog payload is not an object" };
  }
  const parsed = backlogSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, reason: "invalid backlog format", message: "backlog items is not a list" };
  }
  const prNumber = parsed.data.pr_number;
  const headSha = normalizeSha(parsed.data.head_sha);
  return {
    ok: true,
    backlog: {
      path: file,
      items: parsed.data.items.filter(isRecord),
      prNumber: typeof prNumber === "number" && Number.isInteger(prNumber) ? prNumber : null,
      headSha: headSha || null,
    },
  };
}
