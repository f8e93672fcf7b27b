import { formatError } from "../../infra/errors.js";
import { runWithWorkerPool } from "../../infra/worker-pool.js";
import type { ProbeOutcome, ProjectProbes, ProjectReport } from "./types.js";

export const DEFAULT_PROBE_WORKERS = 4;

async function settle<T>(probe: () => Promise<T>): Promise<ProbeOutcome<T>> {
  try {
    return { ok: true, value: await probe() };
  } catch (err) {
    return { ok: false, error: formatError(err) };
  }
}

/**
 * Runs the read-only status probes either one after another or in a bounded pool. The
 * report is assembled after every probe settled, in a fixed key order, so both modes
 * produce the same JSON. A throwing probe only fails its own key.
 */
export async function collectProjectReport(params: {
  command: string;
  timestamp: string;
  probes: ProjectProbes;
  parallel: boolean;
  maxWorkers?: number;
}): Promise<ProjectReport> {
  const { probes } = params;
  const settled: Omit<ProjectReport, "command" | "timestamp"> = {};

  const tasks: (() => Promise<void>)[] = [];
  if (probes.git) {
    const probe = probes.git;
    tasks.push(async () => {
      settled.git = await settle(probe);
    });
  }
  if (probes.mutants) {
    const probe = probes.mutants;
    tasks.push(async () => {
      settled.mutants = await settle(probe);
    });
  }
  if (probes.ci) {
    const probe = probes.ci;
    tasks.push(async () => {
      settled.ci = await settle(probe);
    });
  }
  if (probes.devLogs) {
    const probe = probes.devLogs;
    tasks.push(async () => {
      settled.devLogs = await settle(probe);
    });
  }

  const workers = params.parallel ? (params.maxWorkers ?? DEFAULT_PROBE_WORKERS) : 1;
  await runWithWorkerPool(tasks, workers);

  return {
    command: params.command,
    timestamp: params.timestamp,
    ...(settled.git ? { git: settled.git } : {}),
    ...(settled.mutants ? { mutants: settled.mutants } : {}),
    ...(settled.ci ? { ci: settled.ci } : {}),
    ...(settled.devLogs ? { devLogs: settled.devLogs } : {}),
  };
}
