import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

const writesByPath = new Map<string, Promise<void>>();

export function withSerializedWrite(filePath: string, run: () => Promise<void>) {
  const resolved = path.resolve(filePath);
  const prev = writesByPath.get(resolved) ?? Promise.resolve();
  const next = prev.catch(() => undefined).then(run);
  writesByPath.set(resolved, next);
  return next;
}

function tmpSibling(target: string) {
  return `${target}.${process.pid}.${crypto.randomBytes(6).toString("hex")}.tmp`;
}

/** Readers never observe a partial file: content lands in a sibling and is renamed over `filePath`. */
export async function writeTextAtomic(filePath: string, content: string) {
  await withSerializedWrite(filePath, async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tmp = tmpSibling(filePath);
    try {
      await fs.writeFile(tmp, content, "utf-8");
      await fs.rename(tmp, filePath);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
  });
  return filePath;
}

export function writeJsonAtomic(filePath: string, value: unknown) {
  return writeTextAtomic(filePath, `${JSON.stringify(value, null, 2)}\n`);
}

export type JsonReadResult = { ok: true; value: unknown } | { ok: false; error: string };

export async function readJsonFile(filePath: string): Promise<JsonReadResult> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "ENOENT") {
      return { ok: false, error: `file not found: ${filePath}` };
    }
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (err) {
    return {
      ok: false,
      error: `invalid json (${err instanceof Error ? err.message : String(err)})`,
    };
  }
}

export async function pathExists(target: string) {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes every entry of `files` into a staging directory next to `dir`, then swaps the
 * staging directory into place. The previous contents of `dir` are removed after the swap, or
 * restored when the swap fails.
 */
export async function publishDirectoryAtomic(dir: string, files: Record<string, string>) {
  const parent = path.dirname(dir);
  await fs.mkdir(parent, { recursive: true });
  const staging = await fs.mkdtemp(path.join(parent, `.${path.basename(dir)}.staging-`));
  const retired = `${dir}.${crypto.randomBytes(6).toString("hex")}.old`;
  let retiredPrevious = false;
  try {
    for (const [name, content] of Object.entries(files)) {
      await fs.writeFile(path.join(staging, name), content, "utf-8");
    }
    if (await pathExists(dir)) {
      await fs.rename(dir, retired);
      retiredPrevious = true;
    }
    await fs.rename(staging, dir);
  } catch (err) {
    await fs.rm(staging, { recursive: true, force: true });
    if (retiredPrevious) {
      await fs.rename(retired, dir).catch((restoreErr: unknown) => {
        throw new AggregateError(
          [err, restoreErr],
          `failed to publish ${dir}; previous contents left at ${retired}`,
        );
      });
    }
    throw err;
  }
  if (retiredPrevious) {
    await fs.rm(retired, { recursive: true, force: true });
  }
  return Object.fromEntries(Object.keys(files).map((name) => [name, path.join(dir, name)]));
}
