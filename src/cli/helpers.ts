import { InvalidArgumentError, Option, type Command } from "commander";
import { resolveRepoPath, type RuntimeConfig } from "../config/runtime-config.js";
import { danger } from "../globals.js";
import { InputValidationError, formatError } from "../infra/errors.js";
import { writeJsonAtomic, writeTextAtomic } from "../infra/json-file.js";
import { runCommandWithTimeout, type CommandRunner } from "../process/exec.js";
import { defaultRuntime } from "../runtime.js";

export type OutputFormat = "json" | "md";

export type CliOptions = Record<string, unknown>;

const PIPE_TIMEOUT_MS = 10 * 60 * 1000;

export function parseIntArg(value: string) {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("expected an integer");
  }
  return parsed;
}

export function parseNumberArg(value: string) {
  const parsed = Number(value.trim());
  if (!value.trim() || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("expected a number");
  }
  return parsed;
}

export function collectArg(value: string, previous: string[] | undefined) {
  return [...(previous ?? []), value];
}

export function choiceOption<T extends string>(flags: string, description: string, choices: readonly T[], fallback: T) {
  return new Option(flags, description).choices(choices).default(fallback);
}

export function readString(opts: CliOptions, key: string) {
  const value = opts[key];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed || undefined;
}

export function readNumber(opts: CliOptions, key: string, fallback: number) {
  const value = opts[key];
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

export function readOptionalNumber(opts: CliOptions, key: string) {
  const value = opts[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function readBoolean(opts: CliOptions, key: string) {
  return opts[key] === true;
}

export function readStringList(opts: CliOptions, key: string) {
  const value = opts[key];
  return Array.isArray(value) ? value.filter((row): row is string => typeof row === "string") : [];
}

export function readChoice<T extends string>(opts: CliOptions, key: string, choices: readonly T[], fallback: T): T {
  const value = opts[key];
  return choices.find((choice) => choice === value) ?? fallback;
}

export function addOutputOptions(command: Command, defaultFormat: OutputFormat) {
  return command
    .addOption(choiceOption("--format <format>", "Report format", ["json", "md"] as const, defaultFormat))
    .option("--output <path>", "Write the report to a file instead of stdout")
    .option("--json-output <path>", "Also write the JSON report to this path")
    .option("--pipe-command <command>", "Also send the rendered report to this command on stdin")
    .option("--pipe-args <arg>", "Argument for --pipe-command (repeatable)", collectArg);
}

/**
 * Prints or writes the rendered report, plus the optional secondary JSON copy and pipe.
 * Returns `exitCode`, unless the pipe command fails: then its own code (2 when it cannot start).
 */
export async function emitReport(params: {
  opts: CliOptions;
  config: RuntimeConfig;
  report: unknown;
  markdown: () => string;
  exitCode: number;
  runPipe?: CommandRunner;
}) {
  const format = readChoice(params.opts, "format", ["json", "md"] as const, "json");
  const content = format === "json" ? JSON.stringify(params.report, null, 2) : params.markdown();
  const output = readString(params.opts, "output");
  if (output) {
    await writeTextAtomic(resolveRepoPath(params.config, output), `${content}\n`);
  } else {
    defaultRuntime.log(content);
  }
  const jsonOutput = readString(params.opts, "jsonOutput");
  if (jsonOutput) {
    await writeJsonAtomic(resolveRepoPath(params.config, jsonOutput), params.report);
  }

  const pipeCommand = readString(params.opts, "pipeCommand");
  if (!pipeCommand) {
    return params.exitCode;
  }
  const runPipe = params.runPipe ?? runCommandWithTimeout;
  let pipeCode: number;
  try {
    const result = await runPipe([pipeCommand, ...readStringList(params.opts, "pipeArgs")], {
      cwd: params.config.repoRoot,
      timeoutMs: PIPE_TIMEOUT_MS,
      input: `${content}\n`,
    });
    pipeCode = result.code ?? 1;
    if (result.stdout) {
      defaultRuntime.log(result.stdout.trimEnd());
    }
  } catch (err) {
    defaultRuntime.error(danger(`Pipe command failed to start: ${pipeCommand} (${formatError(err)})`));
    return 2;
  }
  if (pipeCode !== 0) {
    defaultRuntime.error(danger(`Pipe command exited with ${pipeCode}: ${pipeCommand}`));
    return pipeCode;
  }
  return params.exitCode;
}

/**
 * Runs one command body and maps its outcome to the process exit code: the returned code,
 * 2 for invalid input, 1 for anything else thrown.
 */
export async function runCommandAction(run: () => Promise<number>) {
  let exitCode: number;
  try {
    exitCode = await run();
  } catch (err) {
    defaultRuntime.error(danger(`Error: ${formatError(err)}`));
    exitCode = err instanceof InputValidationError ? 2 : 1;
  }
  if (exitCode !== 0) {
    defaultRuntime.exit(exitCode);
  }
}
