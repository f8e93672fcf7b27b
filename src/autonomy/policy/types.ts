import type { AutonomyMode } from "../types.js";

/** Process-wide control-plane policy. Loaded once per invocation and never mutated. */
export type ControlPlanePolicy = Readonly<{
  autonomyModeDefault: AutonomyMode;
  allowedBranches: readonly string[];
  allowedWorkflowDispatches: readonly string[];
  allowedFixCommandPrefixes: readonly (readonly string[])[];
  /** `0` disables the cap. */
  maxRoundsHardCap: number;
  maxHoursHardCap: number;
  maxTasksHardCap: number;
  packetRoot?: string;
  queueRoot?: string;
  replayWindowSeconds: number;
}>;

export type ControllerCapsRequest = {
  maxRounds: number;
  maxHours: number;
  maxTasks: number;
};
