import { spawn } from "node:child_process";

export type CommandOptions = {
  cwd?: string;
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
  maxOutputChars?: number;
  /** Written to stdin before it is closed; stdin is empty otherwise. */
  input?: string;
};

export type CommandResult = {
  code: number | null;
  signal: NodeJS.Signals | null;
  killed: boolean;
  stdout: string;
  stderr: string;
};

export type CommandRunner = (argv: string[], options: CommandOptions) => Promise<CommandResult>;

const DEFAULT_MAX_OUTPUT_CHARS = 2_000_000;

function appendBounded(current: string, chunk: string, max: number) {
  const next = current + chunk;
  return next.length > max ? next.slice(next.length - max) : next;
}

/**
 * Runs `argv` directly (no shell) and resolves once the process exits or is
 * killed after `timeoutMs`. Rejects only when the process cannot be launched.
 */
export function runCommandWithTimeout(
  argv: string[],
  options: CommandOptions,
): Promise<CommandResult> {
  const [command, ...args] = argv;
  if (!command) {
    return Promise.reject(new Error("empty command argv"));
  }
  const maxOutputChars = options.maxOutputChars ?? DEFAULT_MAX_OUTPUT_CHARS;
  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ["pipe", "pipe", "pipe"],
    });
    let stdout = "";
    let stderr = "";
    let killed = false;
    let settled = false;

    // a reader that exits before draining stdin surfaces as EPIPE here; keep it with stderr
    child.stdin.on("error", (err) => {
      stderr = appendBounded(stderr, `stdin: ${err.message}\n`, maxOutputChars);
    });
    child.stdin.end(options.input ?? "");

    const timer = setTimeout(() => {
      killed = true;
      child.kill("SIGKILL");
    }, Math.max(1, options.timeoutMs));

    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => {
      stdout = appendBounded(stdout, chunk, maxOutputChars);
    });
    child.stderr.on("data", (chunk: string) => {
      stderr = appendBounded(stderr, chunk, maxOutputChars);
    });
    child.on("error", (err) => {
      clearTimeout(timer);
      if (settled) {
        return;
      }
      settled = true;
      reject(err);
    });
    child.on("close", (code, signal) => {
      clearTimeout(timer);
      if (settled) {
        return;
      }
      settled = true;
      resolve({ code, signal, killed, stdout, stderr });
    });
  });
}
