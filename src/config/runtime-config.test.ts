import path from "node:path";
import { describe, expect, it } from "vitest";
import { createDefaultControlPlanePolicy } from "../autonomy/policy/runtime.js";
import { InputValidationError } from "../infra/errors.js";
import { createRuntimeConfig, parseFixCommandPrefixes, resolvePolicyPath } from "./runtime-config.js";

describe("runtime config", () => {
  const policy = createDefaultControlPlanePolicy({ autonomyModeDefault: "off" });

  it("uses policy defaults when the environment is empty", () => {
    const config = createRuntimeConfig({ env: {}, policy, cwd: "/repo" });
    expect(config).toEqual({
      autonomyMode: "off",
      ciEnvironment: false,
      repo: undefined,
      repoRoot: "/repo",
      eventLogPath: path.resolve("/repo", "dev/reports/autonomy/events.jsonl"),
      actor: "autoloop",
      fixCommandPrefixesOverride: [],
    });
  });

  it("reads overrides from the environment once", () => {
    const config = createRuntimeConfig({
      env: {
        AUTONOMY_MODE: "operate",
        CI: "Yes",
        GITHUB_REPOSITORY: "acme/widgets",
        AUTOLOOP_ACTOR: "nightly",
        AUTOLOOP_EVENT_LOG: "/var/log/autoloop.jsonl",
      },
      policy,
      cwd: "/repo",
    });
    expect(config.autonomyMode).toBe("operate");
    expect(config.ciEnvironment).toBe(true);
    expect(config.repo).toBe("acme/widgets");
    expect(config.actor).toBe("nightly");
    expect(config.eventLogPath).toBe("/var/log/autoloop.jsonl");
  });

  it("rejects unknown autonomy modes", () => {
    expect(() => createRuntimeConfig({ env: { AUTONOMY_MODE: "max" }, policy, cwd: "/repo" })).toThrow(
      InputValidationError,
    );
  });

  it("splits prefix overrides on semicolons", () => {
    expect(parseFixCommandPrefixes(`npm run fix; node "scripts/fix all.mjs";;`)).toEqual([
      ["npm", "run", "fix"],
      ["node", "scripts/fix all.mjs"],
    ]);
  });

  it("resolves the policy path from flag, env, then default", () => {
    expect(resolvePolicyPath({ env: {}, cwd: "/repo" })).toBe(
      path.resolve("/repo", "config/control-plane-policy.json"),
    );
    expect(resolvePolicyPath({ env: { AUTOLOOP_POLICY_PATH: "p.json" }, cwd: "/repo" })).toBe(
      path.resolve("/repo", "p.json"),
    );
    expect(
      resolvePolicyPath({ env: { AUTOLOOP_POLICY_PATH: "p.json" }, cwd: "/repo", override: "/etc/q.json" }),
    ).toBe("/etc/q.json");
  });
});
