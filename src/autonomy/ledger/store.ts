import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { withSerializedWrite } from "../../infra/json-file.js";
import type { ControlPlaneEvent } from "./types.js";

const MAX_EVENT_READ = 1000;

const eventSchema = z.object({
  id: z.string(),
  ts: z.string(),
  correlationId: z.string(),
  actor: z.string(),
  eventType: z.enum([
    "controller_started",
    "controller_round",
    "controller_finished",
    "policy_denied",
    "controller_action",
  ]),
  summary: z.string(),
  evidence: z.record(z.unknown()).optional(),
});

export type EventLogWriter = {
  append: (
    input: Omit<ControlPlaneEvent, "id" | "ts"> & { id?: string; ts?: string },
  ) => Promise<ControlPlaneEvent>;
};

export async function appendControlPlaneEvent(
  eventLogPath: string,
  input: Omit<ControlPlaneEvent, "id" | "ts"> & { id?: string; ts?: string },
) {
  const entry: ControlPlaneEvent = {
    ...input,
    id: input.id?.trim() || crypto.randomUUID(),
    ts: input.ts?.trim() || new Date().toISOString(),
    correlationId: input.correlationId.trim() || crypto.randomUUID(),
  };
  await withSerializedWrite(eventLogPath, async () => {
    await fs.mkdir(path.dirname(eventLogPath), { recursive: true });
    await fs.appendFile(eventLogPath, `${JSON.stringify(entry)}\n`, "utf-8");
  });
  return entry;
}

export function createEventLogWriter(eventLogPath: string): EventLogWriter {
  return { append: (input) => appendControlPlaneEvent(eventLogPath, input) };
}

export const noopEventLog: EventLogWriter = {
  append: async (input) => ({
    ...input,
    id: input.id ?? "",
    ts: input.ts ?? new Date().toISOString(),
  }),
};

/** Newest first. Lines that fail to decode are skipped. */
export async function readControlPlaneEvents(params: {
  eventLogPath: string;
  limit?: number;
  offset?: number;
}): Promise<ControlPlaneEvent[]> {
  const raw = await fs.readFile(params.eventLogPath, "utf-8").catch((err: unknown) => {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return "";
    }
    throw err;
  });
  if (!raw.trim()) {
    return [];
  }
  const limit = Math.max(0, Math.min(MAX_EVENT_READ, Math.floor(params.limit ?? 100)));
  const offset = Math.max(0, Math.floor(params.offset ?? 0));

  const parsed = raw
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line) => {
      try {
        const result = eventSchema.safeParse(JSON.parse(line));
        return result.success ? result.data : null;
      } catch {
        return null;
      }
    })
    .filter((entry): entry is ControlPlaneEvent => entry !== null)
    .toReversed();
  return parsed.slice(offset, offset + limit);
}
