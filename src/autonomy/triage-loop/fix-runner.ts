import { formatError } from "../../infra/errors.js";
import { runCommandWithTimeout, type CommandRunner } from "../../process/exec.js";

/** Backlog state handed to the fix command so it can correlate its work to the triggering run. */
export type FixCommandContext = {
  planId: string;
  attempt: number;
  repo: string;
  branch: string;
  backlogCount: number;
  backlogDir: string;
  runId: number;
  runSha: string;
};

export type FixCommandRequest = {
  argv: readonly string[];
  cwd: string;
  timeoutMs: number;
  env: NodeJS.ProcessEnv;
};

export type FixCommandResult = {
  code: number | null;
  killed: boolean;
  /** Set when the process could not be launched at all. */
  error?: string;
  stdout: string;
  stderr: string;
};

export type FixCommandRunner = (request: FixCommandRequest) => Promise<FixCommandResult>;

const MIN_FIX_TIMEOUT_MS = 1_000;
const FIX_OUTPUT_LIMIT = 200_000;

export function buildFixCommandEnv(
  baseEnv: Readonly<Record<string, string | undefined>>,
  context: FixCommandContext,
): NodeJS.ProcessEnv {
  return {
    ...baseEnv,
    AUTOLOOP_PLAN_ID: context.planId,
    AUTOLOOP_ATTEMPT: String(context.attempt),
    AUTOLOOP_REPO: context.repo,
    AUTOLOOP_BRANCH: context.branch,
    AUTOLOOP_BACKLOG_COUNT: String(context.backlogCount),
    AUTOLOOP_BACKLOG_DIR: context.backlogDir,
    AUTOLOOP_SOURCE_RUN_ID: String(context.runId),
    AUTOLOOP_SOURCE_SHA: context.runSha,
  };
}

export function createFixCommandRunner(run: CommandRunner = runCommandWithTimeout): FixCommandRunner {
  return async (request) => {
    if (request.argv.length === 0) {
      return { code: null, killed: false, error: "empty command argv", stdout: "", stderr: "" };
    }
    try {
      const result = await run([...request.argv], {
        cwd: request.cwd,
        env: request.env,
        timeoutMs: Math.max(MIN_FIX_TIMEOUT_MS, Math.floor(request.timeoutMs)),
        maxOutputChars: FIX_OUTPUT_LIMIT,
      });
      return {
        code: result.code,
        killed: result.killed,
        stdout: result.stdout,
        stderr: result.stderr,
      };
    } catch (err) {
      return { code: null, killed: false, error: formatError(err), stdout: "", stderr: "" };
    }
  };
}

export const runFixCommand = createFixCommandRunner();
