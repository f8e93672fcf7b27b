import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { formatError } from "../../infra/errors.js";
import type { SourceKind } from "../types.js";

export const SOURCE_KINDS: readonly SourceKind[] = ["triage-loop", "mutation-loop", "triage"];

export const DEFAULT_SOURCE_CANDIDATES: readonly string[] = [
  ".autoloop/triage-loop.json",
  ".autoloop/mutation-loop.json",
  ".autoloop/triage.json",
  path.join(os.tmpdir(), "autoloop-triage-loop.json"),
  path.join(os.tmpdir(), "autoloop-mutation-loop.json"),
  path.join(os.tmpdir(), "autoloop-triage.json"),
];

export type TriageLoopSource = {
  kind: "triage-loop";
  unresolvedCount: number;
  reason: string;
  branch: string;
  sourceRunId: number | null;
};

export type MutationHotspot = { label: string; missed: number | null };

export type MutationLoopSource = {
  kind: "mutation-loop";
  lastScore: number | null;
  threshold: number | null;
  reason: string;
  branch: string;
  hotspots: MutationHotspot[];
};

export type TriageSource = {
  kind: "triage";
  total: number;
  high: number;
  medium: number;
  nextActions: string[];
};

export type SourceBody = TriageLoopSource | MutationLoopSource | TriageSource;

/** One decoded candidate artifact. `rawTimestamp` is kept verbatim for packet hashing. */
export type SourceCandidate = {
  path: string;
  body: SourceBody;
  rawTimestamp: string;
  timestamp: Date | null;
  mtimeMs: number;
};

const count = z.coerce.number().catch(0).transform((value) => (Number.isFinite(value) ? Math.trunc(value) : 0));
const text = z.unknown().transform((value) => (value === null || value === undefined ? "" : String(value).trim()));

const triageLoopSchema = z.object({
  unresolvedCount: count.optional(),
  unresolved_count: count.optional(),
  reason: text,
  branch: text,
  sourceRunId: z.unknown().optional(),
  source_run_id: z.unknown().optional(),
});

const hotspotSchema = z
  .object({ module: text, target: text, path: text, missed: z.unknown().optional() })
  .transform((row): MutationHotspot => ({
    label: row.module || row.target || row.path || "unknown",
    missed: typeof row.missed === "number" && Number.isInteger(row.missed) ? row.missed : null,
  }));

const mutationLoopSchema = z.object({
  last_score: z.number().nullish().catch(null),
  threshold: z.number().nullish().catch(null),
  reason: text,
  branch: text,
  last_hotspots: z.array(z.unknown()).catch([]).optional(),
});

const triageSchema = z.object({
  rollup: z
    .object({
      total: count.optional(),
      by_severity: z.object({ high: count.optional(), medium: count.optional() }).catch({}).optional(),
    })
    .catch({})
    .optional(),
  next_actions: z.array(z.unknown()).catch([]).optional(),
});

function positiveInt(value: unknown) {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : null;
}

export function sourceKindOf(payload: Record<string, unknown>): string {
  const command = String(payload.command ?? "").trim().toLowerCase();
  return command === "mutation_loop" ? "mutation-loop" : command;
}

function isSourceKind(value: string): value is SourceKind {
  return SOURCE_KINDS.some((kind) => kind === value);
}

/** Decodes the kind-specific fields of a report. Missing or odd fields fall back to neutral values. */
export function decodeSourceBody(kind: SourceKind, payload: Record<string, unknown>): SourceBody {
  switch (kind) {
    case "triage-loop": {
      const doc = triageLoopSchema.parse(payload);
      return {
        kind,
        unresolvedCount: doc.unresolvedCount ?? doc.unresolved_count ?? 0,
        reason: doc.reason || "unknown",
        branch: doc.branch || "unknown",
        sourceRunId: positiveInt(doc.sourceRunId) ?? positiveInt(doc.source_run_id),
      };
    }
    case "mutation-loop": {
      const doc = mutationLoopSchema.parse(payload);
      const hotspots: MutationHotspot[] = [];
      for (const row of (doc.last_hotspots ?? []).slice(0, 3)) {
        const parsed = hotspotSchema.safeParse(row);
        if (parsed.success) {
          hotspots.push(parsed.data);
        }
      }
      return {
        kind,
        lastScore: doc.last_score ?? null,
        threshold: doc.threshold ?? null,
        reason: doc.reason || "unknown",
        branch: doc.branch || "unknown",
        hotspots,
      };
    }
    case "triage": {
      const doc = triageSchema.parse(payload);
      return {
        kind,
        total: doc.rollup?.total ?? 0,
        high: doc.rollup?.by_severity?.high ?? 0,
        medium: doc.rollup?.by_severity?.medium ?? 0,
        nextActions: (doc.next_actions ?? []).map((row) => String(row).trim()).filter(Boolean),
      };
    }
  }
}

/** ISO-8601 parse; a timestamp without a zone designator is read as UTC. */
export function parseSourceTimestamp(raw: string): Date | null {
  const value = raw.trim();
  if (!value) {
    return null;
  }
  if (!/^\d{4}-\d{2}-\d{2}/.test(value)) {
    return null;
  }
  const dated = /^\d{4}-\d{2}-\d{2}$/.test(value) ? `${value}T00:00:00` : value;
  const zoned = /(Z|[+-]\d{2}:?\d{2})$/i.test(dated) ? dated : `${dated}Z`;
  const parsed = new Date(zoned);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function discoverSources(params: { candidates: readonly string[]; cwd: string }) {
  const sources: SourceCandidate[] = [];
  const warnings: string[] = [];
  const checkedPaths: string[] = [];
  for (const candidate of params.candidates) {
    const resolved = path.resolve(params.cwd, candidate);
    checkedPaths.push(resolved);
    let raw: string;
    let mtimeMs: number;
    try {
      raw = await fs.readFile(resolved, "utf-8");
      mtimeMs = (await fs.stat(resolved)).mtimeMs;
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        continue;
      }
      warnings.push(`${resolved}: ${formatError(err)}`);
      continue;
    }
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (err) {
      warnings.push(`${resolved}: invalid JSON (${formatError(err)})`);
      continue;
    }
    if (!isRecord(payload)) {
      warnings.push(`${resolved}: expected top-level JSON object`);
      continue;
    }
    const kind = sourceKindOf(payload);
    if (!isSourceKind(kind)) {
      warnings.push(`${resolved}: unsupported command '${kind || "missing"}'`);
      continue;
    }
    const rawTimestamp = typeof payload.timestamp === "string" ? payload.timestamp : "";
    sources.push({
      path: resolved,
      body: decodeSourceBody(kind, payload),
      rawTimestamp,
      timestamp: parseSourceTimestamp(rawTimestamp),
      mtimeMs,
    });
  }
  return { sources, warnings, checkedPaths };
}

/** Preferred kind first, then the remaining kinds in fixed order; newest first within a kind. */
export function chooseSource(sources: readonly SourceCandidate[], preferSource: SourceKind) {
  const order = [preferSource, ...SOURCE_KINDS.filter((kind) => kind !== preferSource)];
  const rank = (candidate: SourceCandidate) => order.indexOf(candidate.body.kind);
  const freshness = (candidate: SourceCandidate) => candidate.timestamp?.getTime() ?? candidate.mtimeMs;
  return sources
    .toSorted((a, b) => rank(a) - rank(b) || freshness(b) - freshness(a))
    .at(0);
}
