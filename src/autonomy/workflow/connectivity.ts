import type { RuntimeConfig } from "../../config/runtime-config.js";

const LOCAL_CONNECTIVITY_ERROR_HINTS = [
  "error connecting to api.github.com",
  "check your internet connection",
  "failed to connect",
  "network is unreachable",
];

export function looksLikeConnectivityError(message: string) {
  const lowered = message.toLowerCase();
  return LOCAL_CONNECTIVITY_ERROR_HINTS.some((hint) => lowered.includes(hint));
}

/** Connectivity failures are only forgiven on a developer machine, never under CI. */
export function isNonBlockingLocalConnectivityError(
  message: string,
  config: Pick<RuntimeConfig, "ciEnvironment">,
) {
  return Boolean(message) && looksLikeConnectivityError(message) && !config.ciEnvironment;
}
