import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { publishDirectoryAtomic, readJsonFile, writeJsonAtomic } from "./json-file.js";

describe("json file helpers", () => {
  let tmpDir = "";

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "autoloop-json-file-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("writes json atomically and leaves no temp files behind", async () => {
    const target = path.join(tmpDir, "nested", "report.json");
    await writeJsonAtomic(target, { ok: true });
    await writeJsonAtomic(target, { ok: false });
    expect(await readJsonFile(target)).toEqual({ ok: true, value: { ok: false } });
    expect(await fs.readdir(path.dirname(target))).toEqual(["report.json"]);
  });

  it("reports missing and malformed files without throwing", async () => {
    const missing = await readJsonFile(path.join(tmpDir, "missing.json"));
    expect(missing.ok).toBe(false);
    const broken = path.join(tmpDir, "broken.json");
    await fs.writeFile(broken, "{not json", "utf-8");
    const result = await readJsonFile(broken);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatch(/^invalid json/);
    }
  });

  it("replaces a published directory as a whole", async () => {
    const dir = path.join(tmpDir, "bundle");
    await publishDirectoryAtomic(dir, { "a.txt": "one", "stale.txt": "old" });
    const files = await publishDirectoryAtomic(dir, { "a.txt": "two" });
    expect(files).toEqual({ "a.txt": path.join(dir, "a.txt") });
    expect((await fs.readdir(dir)).toSorted()).toEqual(["a.txt"]);
    expect(await fs.readFile(path.join(dir, "a.txt"), "utf-8")).toBe("two");
    expect((await fs.readdir(tmpDir)).toSorted()).toEqual(["bundle"]);
  });

  it("keeps the previous directory when the swap fails", async () => {
    const dir = path.join(tmpDir, "bundle");
    await publishDirectoryAtomic(dir, { "a.txt": "one" });
    const realRename = fs.rename.bind(fs);
    vi.spyOn(fs, "rename").mockImplementation(async (from, to) => {
      if (String(from).includes(".bundle.staging-")) {
        throw new Error("EXDEV: cross-device link not permitted");
      }
      return realRename(from, to);
    });

    await expect(publishDirectoryAtomic(dir, { "a.txt": "two" })).rejects.toThrow("EXDEV");
    expect(await fs.readFile(path.join(dir, "a.txt"), "utf-8")).toBe("one");
    expect(await fs.readdir(tmpDir)).toEqual(["bundle"]);
  });
});
