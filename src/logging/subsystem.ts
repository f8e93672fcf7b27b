import { danger, muted, warn } from "../globals.js";

export type AutonomyLogger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export const silentLogger: AutonomyLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/** Writes `[subsystem] message` lines to stderr so stdout stays reserved for reports. */
export function createSubsystemLogger(
  subsystem: string,
  write: (line: string) => void = (line) => process.stderr.write(`${line}\n`),
): AutonomyLogger {
  const prefix = muted(`[${subsystem}]`);
  return {
    info: (message) => write(`${prefix} ${message}`),
    warn: (message) => write(`${prefix} ${warn(message)}`),
    error: (message) => write(`${prefix} ${danger(message)}`),
  };
}
