import type { MutationLoopSource, SourceBody, TriageLoopSource, TriageSource } from "./sources.js";

export type PacketDraft = { lines: string[]; nextActions: string[] };

/** Scores are ratios in 0..1. */
function formatPercent(value: number | null) {
  return value === null ? "n/a" : `${(value * 100).toFixed(2)}%`;
}

function draftFromTriageLoop(body: TriageLoopSource): PacketDraft {
  const lines = [
    "Loop feedback packet:",
    `Loop snapshot for branch \`${body.branch}\`.`,
    `Reason: \`${body.reason}\`.`,
    `Unresolved medium/high findings: \`${body.unresolvedCount}\`.`,
  ];
  if (body.sourceRunId !== null) {
    lines.push(`Source run id: \`${body.sourceRunId}\`.`);
  }
  lines.push("", "Task: propose the next bounded remediation step with guardrails and verification.");
  const nextActions =
    body.unresolvedCount === 0
      ? ["No medium/high backlog remains. Continue with normal CI verification."]
      : [
          "Review unresolved findings and apply bounded fixes with the same source run correlation.",
          "Re-run report-only loop and verify unresolved count trends downward.",
        ];
  return { lines, nextActions };
}

function draftFromMutationLoop(body: MutationLoopSource): PacketDraft {
  const lines = [
    "Loop feedback packet:",
    `Mutation loop snapshot for branch \`${body.branch}\`.`,
    `Reason: \`${body.reason}\`.`,
    `Score \`${formatPercent(body.lastScore)}\` vs threshold \`${formatPercent(body.threshold)}\`.`,
    "",
    "Task: propose the smallest safe test/code change sequence to improve confidence.",
  ];
  const belowThreshold =
    body.lastScore !== null && body.threshold !== null && body.lastScore < body.threshold;
  const nextActions = [
    belowThreshold
      ? "Prioritize mutation hotspots and add focused tests before enabling fix mode."
      : "Mutation score meets threshold. Keep report-only monitoring active.",
  ];
  if (body.hotspots.length > 0) {
    const labels = body.hotspots.map((row) =>
      row.missed === null ? row.label : `${row.label} (missed=${row.missed})`,
    );
    nextActions.push(`Top hotspots: ${labels.join(", ")}`);
  }
  return { lines, nextActions };
}

function draftFromTriage(body: TriageSource): PacketDraft {
  return {
    lines: [
      "Loop feedback packet:",
      "Triage snapshot from local control-plane signals.",
      `Issue rollup: total=${body.total}, high=${body.high}, medium=${body.medium}.`,
      "",
      "Task: convert this triage snapshot into an ordered, guarded execution plan.",
    ],
    nextActions:
      body.nextActions.length > 0
        ? [...body.nextActions]
        : ["No explicit next actions found; review triage snapshot and owners."],
  };
}

export function buildPacketDraft(body: SourceBody): PacketDraft {
  switch (body.kind) {
    case "triage-loop":
      return draftFromTriageLoop(body);
    case "mutation-loop":
      return draftFromMutationLoop(body);
    case "triage":
      return draftFromTriage(body);
  }
}
