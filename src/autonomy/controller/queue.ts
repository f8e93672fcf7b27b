import fs from "node:fs/promises";
import path from "node:path";
import { writeJsonAtomic, writeTextAtomic } from "../../infra/json-file.js";
import type { CheckpointPacket, PhoneStatusPayload } from "../types.js";

/**
 * Queue directories under one root. A controller invocation is the only writer of its
 * run id namespace, so files are replaced atomically without locks.
 */
export type QueueLayout = {
  root: string;
  inbox: string;
  outbox: string;
  archive: string;
  phone: string;
  phoneLatestJson: string;
  phoneLatestMd: string;
};

export function formatRound(round: number) {
  return String(round).padStart(3, "0");
}

export function roundDirectory(runPacketRoot: string, round: number) {
  return path.join(runPacketRoot, `round-${formatRound(round)}`);
}

export function resolveQueueLayout(root: string): QueueLayout {
  const phone = path.join(root, "phone");
  return {
    root,
    inbox: path.join(root, "inbox"),
    outbox: path.join(root, "outbox"),
    archive: path.join(root, "archive"),
    phone,
    phoneLatestJson: path.join(phone, "latest.json"),
    phoneLatestMd: path.join(phone, "latest.md"),
  };
}

export async function ensureQueueLayout(layout: QueueLayout) {
  for (const dir of [layout.inbox, layout.outbox, layout.archive, layout.phone]) {
    await fs.mkdir(dir, { recursive: true });
  }
}

export async function writeInboxPacket(params: {
  layout: QueueLayout;
  controllerRunId: string;
  packet: CheckpointPacket;
}) {
  const name = `${params.controllerRunId}-r${formatRound(params.packet.round)}-${params.packet.idempotencyKey}.json`;
  return writeJsonAtomic(path.join(params.layout.inbox, name), params.packet);
}

async function writePhonePair(jsonPath: string, mdPath: string, payload: PhoneStatusPayload, markdown: string) {
  await writeJsonAtomic(jsonPath, payload);
  await writeTextAtomic(mdPath, `${markdown}\n`);
}

/** Round copy, append-only history entry, then the `latest` pointer. */
export async function writeRoundPhoneStatus(params: {
  layout: QueueLayout;
  roundDir: string;
  controllerRunId: string;
  round: number;
  payload: PhoneStatusPayload;
  markdown: string;
}) {
  const json = path.join(params.roundDir, "phone-status.json");
  const md = path.join(params.roundDir, "phone-status.md");
  const historyBase = path.join(params.layout.phone, `${params.controllerRunId}-r${formatRound(params.round)}`);
  await writePhonePair(json, md, params.payload, params.markdown);
  await writePhonePair(`${historyBase}.json`, `${historyBase}.md`, params.payload, params.markdown);
  await writePhonePair(params.layout.phoneLatestJson, params.layout.phoneLatestMd, params.payload, params.markdown);
  return { json, md };
}

export async function writeFinalPhoneStatus(params: {
  layout: QueueLayout;
  controllerRunId: string;
  payload: PhoneStatusPayload;
  markdown: string;
}) {
  const base = path.join(params.layout.phone, `${params.controllerRunId}-final`);
  await writePhonePair(`${base}.json`, `${base}.md`, params.payload, params.markdown);
  await writePhonePair(params.layout.phoneLatestJson, params.layout.phoneLatestMd, params.payload, params.markdown);
  return { json: `${base}.json`, md: `${base}.md` };
}
