export type ControlPlaneEventType =
  | "controller_started"
  | "controller_round"
  | "controller_finished"
  | "policy_denied"
  | "controller_action";

export type ControlPlaneEvent = {
  id: string;
  ts: string;
  correlationId: string;
  actor: string;
  eventType: ControlPlaneEventType;
  summary: string;
  evidence?: Record<string, unknown>;
};
