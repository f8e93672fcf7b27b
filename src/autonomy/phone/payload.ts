import { z } from "zod";
import { pathExists, readJsonFile } from "../../infra/json-file.js";
import type { PhoneStatusPayload } from "../types.js";

const stringList = z.array(z.string()).default([]);

const phoneStatusSchema: z.ZodType<PhoneStatusPayload, z.ZodTypeDef, unknown> = z.object({
  schemaVersion: z.literal(1),
  command: z.literal("phone-status"),
  timestamp: z.string(),
  ok: z.boolean(),
  phase: z.enum(["running", "paused", "resolved", "error"]),
  reason: z.string(),
  controller: z.object({
    planId: z.string(),
    controllerRunId: z.string(),
    repo: z.string(),
    branchBase: z.string(),
    modeEffective: z.enum(["report-only", "plan-then-fix", "fix-only"]),
    resolved: z.boolean(),
    roundsCompleted: z.number().int(),
    tasksCompleted: z.number().int(),
    maxRounds: z.number().int(),
    maxTasks: z.number().int(),
    currentRound: z.number().int(),
    latestWorkingBranch: z.string().nullable(),
  }),
  loop: z.object({
    triageReason: z.string(),
    unresolvedCount: z.number().int(),
    risk: z.enum(["low", "medium", "high"]),
    nextActions: stringList,
  }),
  terminal: z.object({
    trace: stringList,
    draftText: z.string().default(""),
    autoSend: z.boolean().default(false),
  }),
  sourceRun: z.object({
    runId: z.number().int().nullable(),
    runSha: z.string().nullable(),
    runUrl: z.string().nullable(),
    runConclusion: z.string().nullable(),
    attemptStatus: z
      .enum(["analyzing-backlog", "resolved", "blocked", "failed", "waiting-for-new-run"])
      .nullable(),
    attemptMessage: z.string().nullable(),
  }),
  warnings: stringList,
  errors: stringList,
});

export type PhoneStatusLoad = { ok: true; value: PhoneStatusPayload } | { ok: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parsePhoneStatusPayload(raw: unknown): PhoneStatusLoad {
  if (!isRecord(raw)) {
    return { ok: false, error: "expected top-level object in phone status artifact" };
  }
  const parsed = phoneStatusSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    return { ok: false, error: `malformed phone status artifact (${issues})` };
  }
  return { ok: true, value: parsed.data };
}

/** Reads a persisted phone-status artifact in full and decodes it before anything acts on it. */
export async function loadPhoneStatus(filePath: string): Promise<PhoneStatusLoad> {
  if (!(await pathExists(filePath))) {
    return { ok: false, error: `phone status artifact not found: ${filePath}` };
  }
  const loaded = await readJsonFile(filePath);
  if (!loaded.ok) {
    return loaded;
  }
  return parsePhoneStatusPayload(loaded.value);
}
