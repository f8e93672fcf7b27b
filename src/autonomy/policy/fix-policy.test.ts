import { describe, expect, it } from "vitest";
import { createRuntimeConfig } from "../../config/runtime-config.js";
import { evaluateFixCommandPolicy } from "./fix-policy.js";
import { createDefaultControlPlanePolicy } from "./runtime.js";

const policy = createDefaultControlPlanePolicy({
  allowedFixCommandPrefixes: [["npm", "run", "fix"]],
});

function configFor(env: Record<string, string>) {
  return createRuntimeConfig({ env, policy, cwd: "/repo" });
}

describe("fix command policy", () => {
  it("never blocks report-only mode or a missing command", () => {
    const config = configFor({});
    expect(
      evaluateFixCommandPolicy({
        mode: "report-only",
        branch: "develop",
        fixArgv: ["rm", "-rf", "/"],
        policy,
        config,
      }),
    ).toBeUndefined();
    expect(
      evaluateFixCommandPolicy({ mode: "fix-only", branch: "develop", fixArgv: undefined, policy, config }),
    ).toBeUndefined();
  });

  it("requires operate mode", () => {
    const reason = evaluateFixCommandPolicy({
      mode: "plan-then-fix",
      branch: "develop",
      fixArgv: ["npm", "run", "fix"],
      policy,
      config: configFor({}),
    });
    expect(reason).toBe("AUTONOMY_MODE=read-only blocks triage-loop fix execution (requires operate)");
  });

  it("requires an allowlisted branch and prefix", () => {
    const config = configFor({ AUTONOMY_MODE: "operate" });
    expect(
      evaluateFixCommandPolicy({
        mode: "fix-only",
        branch: "feature/x",
        fixArgv: ["npm", "run", "fix"],
        policy,
        config,
      }),
    ).toBe("branch feature/x is not allowlisted for triage-loop fix execution");
    expect(
      evaluateFixCommandPolicy({
        mode: "fix-only",
        branch: "develop",
        fixArgv: ["npm", "run", "fixup"],
        policy,
        config,
      }),
    ).toBe("fix command blocked by allowlist policy");
    expect(
      evaluateFixCommandPolicy({
        mode: "fix-only",
        branch: "develop",
        fixArgv: ["npm", "run", "fix", "--", "--all"],
        policy,
        config,
      }),
    ).toBeUndefined();
  });

  it("prefers environment prefixes over the policy list", () => {
    const config = configFor({
      AUTONOMY_MODE: "operate",
      AUTOLOOP_FIX_COMMAND_PREFIXES: "node scripts/fix.mjs; make fix",
    });
    expect(
      evaluateFixCommandPolicy({
        mode: "fix-only",
        branch: "develop",
        fixArgv: ["npm", "run", "fix"],
        policy,
        config,
      }),
    ).toBe("fix command blocked by allowlist policy");
    expect(
      evaluateFixCommandPolicy({
        mode: "fix-only",
        branch: "develop",
        fixArgv: ["make", "fix"],
        policy,
        config,
      }),
    ).toBeUndefined();
  });

  it("blocks when no prefixes exist anywhere", () => {
    const reason = evaluateFixCommandPolicy({
      mode: "fix-only",
      branch: "develop",
      fixArgv: ["npm", "run", "fix"],
      policy: createDefaultControlPlanePolicy(),
      config: configFor({ AUTONOMY_MODE: "operate" }),
    });
    expect(reason).toBe("no allowed triage-loop fix command prefixes configured");
  });
});
