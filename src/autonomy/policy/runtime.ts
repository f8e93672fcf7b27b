import fs from "node:fs/promises";
import { z } from "zod";
import { InputValidationError } from "../../infra/errors.js";
import { splitCommandLine } from "../../process/argv.js";
import type { ControlPlanePolicy, ControllerCapsRequest } from "./types.js";

export const DEFAULT_POLICY_PATH = "config/control-plane-policy.json";
export const DEFAULT_ALLOWED_BRANCHES = ["develop"] as const;
export const DEFAULT_REPLAY_WINDOW_SECONDS = 300;

const prefixSchema = z.union([
  z.array(z.string()),
  z.string().transform((value, ctx) => {
    try {
      return splitCommandLine(value);
    } catch (err) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: String(err) });
      return z.NEVER;
    }
  }),
]);

const capSchema = z.number().nonnegative().default(0);

const policyDocumentSchema = z.object({
  autonomy_mode_default: z.enum(["off", "read-only", "operate"]).default("read-only"),
  allowed_branches: z.array(z.string()).default([]),
  allowed_workflow_dispatches: z.array(z.string()).default([]),
  allowed_fix_command_prefixes: z.array(prefixSchema).default([]),
  max_rounds_hard_cap: capSchema,
  max_hours_hard_cap: capSchema,
  max_tasks_hard_cap: capSchema,
  packet_root: z.string().optional(),
  queue_root: z.string().optional(),
  replay_window_seconds: z.number().int().positive().default(DEFAULT_REPLAY_WINDOW_SECONDS),
});

function normalizeList(values: readonly string[]) {
  return [...new Set(values.map((value) => value.trim()).filter(Boolean))];
}

function normalizeOptionalString(value: string | undefined) {
  const trimmed = value?.trim();
  return trimmed || undefined;
}

export function normalizePrefixes(prefixes: readonly (readonly string[])[]) {
  return prefixes
    .map((prefix) => prefix.map((token) => token.trim()).filter(Boolean))
    .filter((prefix) => prefix.length > 0);
}

export function createDefaultControlPlanePolicy(
  partial?: Partial<ControlPlanePolicy>,
): ControlPlanePolicy {
  const allowedBranches = normalizeList(partial?.allowedBranches ?? []);
  return Object.freeze({
    autonomyModeDefault: partial?.autonomyModeDefault ?? "read-only",
    allowedBranches: allowedBranches.length > 0 ? allowedBranches : [...DEFAULT_ALLOWED_BRANCHES],
    allowedWorkflowDispatches: normalizeList(partial?.allowedWorkflowDispatches ?? []),
    allowedFixCommandPrefixes: normalizePrefixes(partial?.allowedFixCommandPrefixes ?? []),
    maxRoundsHardCap: Math.max(0, partial?.maxRoundsHardCap ?? 0),
    maxHoursHardCap: Math.max(0, partial?.maxHoursHardCap ?? 0),
    maxTasksHardCap: Math.max(0, partial?.maxTasksHardCap ?? 0),
    packetRoot: normalizeOptionalString(partial?.packetRoot),
    queueRoot: normalizeOptionalString(partial?.queueRoot),
    replayWindowSeconds: partial?.replayWindowSeconds ?? DEFAULT_REPLAY_WINDOW_SECONDS,
  });
}

export function parseControlPlanePolicy(raw: unknown, source = "policy"): ControlPlanePolicy {
  const parsed = policyDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new InputValidationError(`invalid control-plane policy in ${source}: ${detail}`);
  }
  const doc = parsed.data;
  return createDefaultControlPlanePolicy({
    autonomyModeDefault: doc.autonomy_mode_default,
    allowedBranches: doc.allowed_branches,
    allowedWorkflowDispatches: doc.allowed_workflow_dispatches,
    allowedFixCommandPrefixes: doc.allowed_fix_command_prefixes,
    maxRoundsHardCap: doc.max_rounds_hard_cap,
    maxHoursHardCap: doc.max_hours_hard_cap,
    maxTasksHardCap: doc.max_tasks_hard_cap,
    packetRoot: doc.packet_root,
    queueRoot: doc.queue_root,
    replayWindowSeconds: doc.replay_window_seconds,
  });
}

/** Reads the whole document before decoding; a missing file yields the defaults. */
export async function loadControlPlanePolicy(policyPath: string): Promise<ControlPlanePolicy> {
  let raw: string;
  try {
    raw = await fs.readFile(policyPath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return createDefaultControlPlanePolicy();
    }
    throw err;
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new InputValidationError(
      `invalid control-plane policy in ${policyPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseControlPlanePolicy(json, policyPath);
}

export function isBranchAllowed(policy: ControlPlanePolicy, branch: string) {
  return policy.allowedBranches.includes(branch.trim());
}

export function isWorkflowDispatchAllowed(policy: ControlPlanePolicy, workflow: string) {
  return policy.allowedWorkflowDispatches.includes(workflow.trim());
}

export function evaluateControllerCaps(
  policy: ControlPlanePolicy,
  request: ControllerCapsRequest,
): string[] {
  const errors: string[] = [];
  if (policy.maxRoundsHardCap > 0 && request.maxRounds > policy.maxRoundsHardCap) {
    errors.push(`--max-rounds=${request.maxRounds} exceeds policy cap ${policy.maxRoundsHardCap}`);
  }
  if (policy.maxHoursHardCap > 0 && request.maxHours > policy.maxHoursHardCap) {
    errors.push(`--max-hours=${request.maxHours} exceeds policy cap ${policy.maxHoursHardCap}`);
  }
  if (policy.maxTasksHardCap > 0 && request.maxTasks > policy.maxTasksHardCap) {
    errors.push(`--max-tasks=${request.maxTasks} exceeds policy cap ${policy.maxTasksHardCap}`);
  }
  return errors;
}
