import path from "node:path";
import { createRuntimeConfig, resolvePolicyPath, type RuntimeConfig } from "../config/runtime-config.js";
import { systemClock, type Clock } from "../infra/clock.js";
import { createEventLogWriter, type EventLogWriter } from "../autonomy/ledger/store.js";
import { loadControlPlanePolicy } from "../autonomy/policy/runtime.js";
import type { ControlPlanePolicy } from "../autonomy/policy/types.js";
import { createGhWorkflowClient } from "../autonomy/workflow/gh-client.js";
import type { WorkflowClient } from "../autonomy/workflow/types.js";
import { createSubsystemLogger, type AutonomyLogger } from "../logging/subsystem.js";
import { readString, type CliOptions } from "./helpers.js";

export type CliContext = {
  config: RuntimeConfig;
  policy: ControlPlanePolicy;
  clock: Clock;
  logger: AutonomyLogger;
  eventLog: EventLogWriter;
  /** Bound to `--repo` or GITHUB_REPOSITORY; commands validate the repository before using it. */
  client: WorkflowClient;
};

/**
 * Resolves everything a command reads from the process once, from the global options
 * (`--repo-root`, `--policy`) and the environment.
 */
export async function createCliContext(params: {
  opts: CliOptions;
  subsystem: string;
  env?: Readonly<Record<string, string | undefined>>;
}): Promise<CliContext> {
  const env = params.env ?? process.env;
  const cwd = path.resolve(readString(params.opts, "repoRoot") ?? process.cwd());
  const policy = await loadControlPlanePolicy(
    resolvePolicyPath({ env, cwd, override: readString(params.opts, "policy") }),
  );
  const config = createRuntimeConfig({ env, policy, cwd });
  const repo = readString(params.opts, "repo") ?? config.repo ?? "";
  return {
    config,
    policy,
    clock: systemClock,
    logger: createSubsystemLogger(params.subsystem),
    eventLog: createEventLogWriter(config.eventLogPath),
    client: createGhWorkflowClient({ repo, cwd }),
  };
}
