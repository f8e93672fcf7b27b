import { Command } from "commander";
import { registerAutonomyLoopCommand } from "./autoloop-cli/register.autonomy-loop.js";
import { registerControllerActionCommand } from "./autoloop-cli/register.controller-action.js";
import { registerLoopPacketCommand } from "./autoloop-cli/register.loop-packet.js";
import { registerPhoneStatusCommand } from "./autoloop-cli/register.phone-status.js";
import { registerTriageLoopCommand } from "./autoloop-cli/register.triage-loop.js";

export const PROGRAM_VERSION = "0.1.0";

export function buildProgram() {
  const program = new Command();
  program
    .name("autoloop")
    .description("Bounded remediation control loop over a CI backlog signal")
    .version(PROGRAM_VERSION)
    .option("--repo-root <dir>", "Repository root that relative paths resolve against (default: cwd)")
    .option("--policy <path>", "Control-plane policy file (default: $AUTOLOOP_POLICY_PATH or config/control-plane-policy.json)");

  registerTriageLoopCommand(program);
  registerLoopPacketCommand(program);
  registerAutonomyLoopCommand(program);
  registerControllerActionCommand(program);
  registerPhoneStatusCommand(program);
  return program;
}
