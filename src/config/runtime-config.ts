import path from "node:path";
import { InputValidationError } from "../infra/errors.js";
import { splitCommandLine } from "../process/argv.js";
import { DEFAULT_POLICY_PATH } from "../autonomy/policy/runtime.js";
import type { ControlPlanePolicy } from "../autonomy/policy/types.js";
import type { AutonomyMode } from "../autonomy/types.js";

export const DEFAULT_EVENT_LOG_PATH = "dev/reports/autonomy/events.jsonl";
export const DEFAULT_ACTOR = "autoloop";

const AUTONOMY_MODES: readonly AutonomyMode[] = ["off", "read-only", "operate"];

/**
 * Everything the control plane reads from the process environment, resolved once at
 * entry. Components receive this object instead of looking at `process.env`.
 */
export type RuntimeConfig = Readonly<{
  autonomyMode: AutonomyMode;
  ciEnvironment: boolean;
  repo?: string;
  repoRoot: string;
  eventLogPath: string;
  actor: string;
  /** From `AUTOLOOP_FIX_COMMAND_PREFIXES`; when non-empty it replaces the policy list. */
  fixCommandPrefixesOverride: readonly (readonly string[])[];
}>;

type Env = Readonly<Record<string, string | undefined>>;

function readEnv(env: Env, key: string) {
  const value = env[key]?.trim();
  return value || undefined;
}

function isAutonomyMode(value: string): value is AutonomyMode {
  return AUTONOMY_MODES.some((mode) => mode === value);
}

export function isCiEnvironment(env: Env) {
  const value = readEnv(env, "CI")?.toLowerCase();
  return value === "1" || value === "true" || value === "yes";
}

export function parseFixCommandPrefixes(raw: string | undefined) {
  if (!raw?.trim()) {
    return [];
  }
  const prefixes: string[][] = [];
  for (const chunk of raw.split(";")) {
    let tokens: string[];
    try {
      tokens = splitCommandLine(chunk.trim());
    } catch (err) {
      throw new InputValidationError(
        `invalid AUTOLOOP_FIX_COMMAND_PREFIXES entry "${chunk.trim()}": ${String(err)}`,
      );
    }
    if (tokens.length > 0) {
      prefixes.push(tokens);
    }
  }
  return prefixes;
}

export function resolvePolicyPath(params: { env: Env; cwd: string; override?: string }) {
  const raw = params.override?.trim() || readEnv(params.env, "AUTOLOOP_POLICY_PATH") || DEFAULT_POLICY_PATH;
  return path.resolve(params.cwd, raw);
}

export function createRuntimeConfig(params: {
  env: Env;
  policy: ControlPlanePolicy;
  cwd: string;
}): RuntimeConfig {
  const rawMode = readEnv(params.env, "AUTONOMY_MODE") ?? params.policy.autonomyModeDefault;
  if (!isAutonomyMode(rawMode)) {
    throw new InputValidationError(
      `AUTONOMY_MODE must be one of ${AUTONOMY_MODES.join("|")} (got "${rawMode}")`,
    );
  }
  return Object.freeze({
    autonomyMode: rawMode,
    ciEnvironment: isCiEnvironment(params.env),
    repo: readEnv(params.env, "GITHUB_REPOSITORY"),
    repoRoot: params.cwd,
    eventLogPath: path.resolve(
      params.cwd,
      readEnv(params.env, "AUTOLOOP_EVENT_LOG") ?? DEFAULT_EVENT_LOG_PATH,
    ),
    actor: readEnv(params.env, "AUTOLOOP_ACTOR") ?? DEFAULT_ACTOR,
    fixCommandPrefixesOverride: parseFixCommandPrefixes(
      readEnv(params.env, "AUTOLOOP_FIX_COMMAND_PREFIXES"),
    ),
  });
}

export function resolveRepoPath(config: RuntimeConfig, raw: string) {
  return path.resolve(config.repoRoot, raw);
}
