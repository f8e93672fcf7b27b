import type { RiskLevel } from "../types.js";
import type { SourceBody } from "./sources.js";

export const RISK_CONFIDENCE: Readonly<Record<RiskLevel, number>> = {
  low: 0.9,
  medium: 0.65,
  high: 0.45,
};

const TRIAGE_LOOP_HIGH_BACKLOG = 8;

export function classifyTriageLoopRisk(unresolvedCount: number): RiskLevel {
  if (unresolvedCount <= 0) {
    return "low";
  }
  return unresolvedCount > TRIAGE_LOOP_HIGH_BACKLOG ? "high" : "medium";
}

export function classifyRisk(body: SourceBody): RiskLevel {
  switch (body.kind) {
    case "triage-loop":
      return classifyTriageLoopRisk(body.unresolvedCount);
    case "mutation-loop":
      if (body.lastScore !== null && body.threshold !== null && body.lastScore < body.threshold) {
        return "high";
      }
      return "low";
    case "triage":
      if (body.high > 0) {
        return "high";
      }
      return body.medium > 0 ? "medium" : "low";
  }
}

/** Source-specific proof that nothing is left to do; a low risk alone never qualifies. */
export function sourceConfirmsResolution(body: SourceBody) {
  switch (body.kind) {
    case "triage-loop":
      return body.unresolvedCount === 0 && body.reason === "resolved";
    case "mutation-loop":
      return body.reason === "threshold_met";
    case "triage":
      return body.total === 0;
  }
}

export function isAutoSendEligible(params: { body: SourceBody; risk: RiskLevel; allowAutoSend: boolean }) {
  return params.allowAutoSend && params.risk === "low" && sourceConfirmsResolution(params.body);
}

/** Counts code points, so a surrogate pair is never split. */
export function truncateChars(value: string, limit: number) {
  if (limit <= 0) {
    return "";
  }
  const chars = Array.from(value);
  if (chars.length <= limit) {
    return value;
  }
  if (limit <= 3) {
    return chars.slice(0, limit).join("");
  }
  return `${chars.slice(0, limit - 3).join("")}...`;
}
