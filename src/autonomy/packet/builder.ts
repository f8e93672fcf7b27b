import { createHash } from "node:crypto";
import { isoTimestamp, type Clock } from "../../infra/clock.js";
import { InputValidationError } from "../../infra/errors.js";
import type { LoopPacketReady, LoopPacketReport, SourceKind } from "../types.js";
import { buildPacketDraft } from "./draft.js";
import type { LiveTriageBuilder } from "./live-triage.js";
import { classifyRisk, isAutoSendEligible, RISK_CONFIDENCE, truncateChars } from "./risk.js";
import { chooseSource, DEFAULT_SOURCE_CANDIDATES, discoverSources } from "./sources.js";

export const MIN_DRAFT_CHARS = 200;

export type LoopPacketOptions = {
  sourceJson: string[];
  preferSource: SourceKind;
  maxAgeHours: number;
  maxDraftChars: number;
  allowAutoSend: boolean;
};

export type LoopPacketDeps = {
  clock: Clock;
  cwd: string;
  liveTriage: LiveTriageBuilder;
};

export type LoopPacketResult = { exitCode: number; report: LoopPacketReport };

export function validateLoopPacketOptions(options: LoopPacketOptions) {
  if (!(options.maxAgeHours > 0)) {
    throw new InputValidationError("--max-age-hours must be > 0");
  }
  if (options.maxDraftChars < MIN_DRAFT_CHARS) {
    throw new InputValidationError(`--max-draft-chars must be >= ${MIN_DRAFT_CHARS}`);
  }
}

function roundHours(hours: number) {
  return Math.round(hours * 1000) / 1000;
}

export function computePacketId(parts: {
  kind: SourceKind;
  rawTimestamp: string;
  path: string;
  draftText: string;
}) {
  const seed = [parts.kind, parts.rawTimestamp, parts.path, parts.draftText].join("|");
  return createHash("sha256").update(seed).digest("hex").slice(0, 16);
}

/**
 * Picks the freshest preferred source, refuses stale or undated ones, and turns it into a
 * risk-classified, length-bounded terminal draft. Rejections come back as reports with
 * exit code 1; only invalid options throw.
 */
export async function buildLoopPacket(
  options: LoopPacketOptions,
  deps: LoopPacketDeps,
): Promise<LoopPacketResult> {
  validateLoopPacketOptions(options);
  const candidates = options.sourceJson.length > 0 ? options.sourceJson : DEFAULT_SOURCE_CANDIDATES;
  const { sources, warnings, checkedPaths } = await discoverSources({ candidates, cwd: deps.cwd });
  let source = chooseSource(sources, options.preferSource);
  if (!source) {
    source = await deps.liveTriage();
    warnings.push("no artifact source found; generated live triage source");
  }

  const now = deps.clock.now();
  const timestamp = isoTimestamp(now);
  const sourceCommand = source.body.kind;

  if (!source.timestamp) {
    return {
      exitCode: 1,
      report: {
        command: "loop-packet",
        timestamp,
        ok: false,
        reason: "source_timestamp_missing",
        sourceCommand,
        sourcePath: source.path,
        maxAgeHours: options.maxAgeHours,
        checkedPaths,
        warnings: [...warnings, "source timestamp missing or invalid"],
      },
    };
  }

  // measured against the source's own timestamp, never the file mtime
  const ageHours = Math.max(0, now - source.timestamp.getTime()) / 3_600_000;
  const freshnessHours = roundHours(ageHours);
  if (ageHours > options.maxAgeHours) {
    return {
      exitCode: 1,
      report: {
        command: "loop-packet",
        timestamp,
        ok: false,
        reason: "source_stale",
        sourceCommand,
        sourcePath: source.path,
        freshnessHours,
        maxAgeHours: options.maxAgeHours,
        checkedPaths,
        warnings,
      },
    };
  }

  const risk = classifyRisk(source.body);
  const confidence = RISK_CONFIDENCE[risk];
  const autoSend = isAutoSendEligible({ body: source.body, risk, allowAutoSend: options.allowAutoSend });
  const draft = buildPacketDraft(source.body);
  const draftText = truncateChars(draft.lines.join("\n"), options.maxDraftChars);
  const packetId = computePacketId({
    kind: sourceCommand,
    rawTimestamp: source.rawTimestamp,
    path: source.path,
    draftText,
  });
  const sourceTimestamp = isoTimestamp(source.timestamp.getTime());

  const report: LoopPacketReady = {
    command: "loop-packet",
    timestamp,
    ok: true,
    reason: "packet_ready",
    sourceCommand,
    sourcePath: source.path,
    sourceTimestamp,
    freshnessHours,
    maxAgeHours: options.maxAgeHours,
    checkedPaths,
    risk,
    confidence,
    nextActions: draft.nextActions,
    summary: `packet ${packetId} ready from ${sourceCommand} (risk=${risk}, auto_send=${autoSend ? "yes" : "no"})`,
    warnings,
    packet: {
      schemaVersion: 1,
      packetId,
      createdAt: timestamp,
      channel: "terminal-draft",
      source: { command: sourceCommand, path: source.path, timestamp: sourceTimestamp },
      guard: { risk, confidence, draftOnly: !autoSend, autoSendPermitted: autoSend },
      nextActions: draft.nextActions,
      evidence: [
        `source_command=${sourceCommand}`,
        `source_path=${source.path}`,
        `freshness_hours=${freshnessHours}`,
      ],
    },
    terminalPacket: { packetId, sourceCommand, draftText, autoSend },
  };
  return { exitCode: 0, report };
}

export function renderLoopPacketMarkdown(report: LoopPacketReport) {
  const ready = report.ok ? report : undefined;
  const lines = ["# autoloop loop-packet", ""];
  lines.push(`- ok: ${report.ok}`);
  lines.push(`- source_command: ${report.sourceCommand}`);
  lines.push(`- source_path: ${report.sourcePath}`);
  lines.push(`- risk: ${ready?.risk ?? "n/a"}`);
  lines.push(`- confidence: ${ready?.confidence ?? "n/a"}`);
  lines.push(`- freshness_hours: ${report.freshnessHours ?? "n/a"}`);
  lines.push(`- auto_send: ${ready?.terminalPacket.autoSend ?? false}`);
  lines.push(`- summary: ${ready?.summary ?? report.reason}`);
  if (report.warnings.length > 0) {
    lines.push(`- warnings: ${report.warnings.join(" | ")}`);
  }
  lines.push("", "## Draft", "");
  lines.push(ready?.terminalPacket.draftText.trim() || "(none)");
  lines.push("", "## Next Actions", "");
  for (const action of ready?.nextActions ?? []) {
    lines.push(`- ${action}`);
  }
  return lines.join("\n");
}
