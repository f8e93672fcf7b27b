import type { RuntimeConfig } from "../../config/runtime-config.js";
import type { LoopMode } from "../types.js";
import { isBranchAllowed } from "./runtime.js";
import type { ControlPlanePolicy } from "./types.js";

function startsWithPrefix(argv: readonly string[], prefix: readonly string[]) {
  if (prefix.length === 0 || prefix.length > argv.length) {
    return false;
  }
  return prefix.every((token, index) => argv[index] === token);
}

/**
 * Returns why a fix command may not run, or `undefined` when it may. Report-only mode and
 * an absent command are never blocked because nothing would execute.
 */
export function evaluateFixCommandPolicy(params: {
  mode: LoopMode;
  branch: string;
  fixArgv: readonly string[] | undefined;
  policy: ControlPlanePolicy;
  config: RuntimeConfig;
}): string | undefined {
  if (params.mode === "report-only" || !params.fixArgv) {
    return undefined;
  }
  if (params.config.autonomyMode !== "operate") {
    return `AUTONOMY_MODE=${params.config.autonomyMode} blocks triage-loop fix execution (requires operate)`;
  }
  if (!isBranchAllowed(params.policy, params.branch)) {
    return `branch ${params.branch} is not allowlisted for triage-loop fix execution`;
  }
  const prefixes =
    params.config.fixCommandPrefixesOverride.length > 0
      ? params.config.fixCommandPrefixesOverride
      : params.policy.allowedFixCommandPrefixes;
  if (prefixes.length === 0) {
    return "no allowed triage-loop fix command prefixes configured";
  }
  if (params.fixArgv.length === 0) {
    return "invalid --fix-command tokenization";
  }
  const argv = params.fixArgv;
  if (!prefixes.some((prefix) => startsWithPrefix(argv, prefix))) {
    return "fix command blocked by allowlist policy";
  }
  return undefined;
}
