import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import yaml from "js-yaml";
import { SnapshotCache } from "./store.js";
import { getSnapshotPath, loadSnapshotCache, saveSnapshotCache } from "./persist.js";

describe("snapshot persistence", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "chartcheck-snapshot-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("places snapshots beside the test file", () => {
    expect(getSnapshotPath("/chart/tests/web_test.yaml")).toBe("/chart/tests/__snapshot__/web_test.yaml.snap");
  });

  it("starts empty when no file exists", async () => {
    const cache = await loadSnapshotCache(join(dir, "missing.snap"));
    expect(cache.toJSON()).toEqual({});
    expect(cache.dirty).toBe(false);
  });

  it("skips writing an unchanged cache", async () => {
    const path = join(dir, "__snapshot__", "web_test.yaml.snap");
    expect(await saveSnapshotCache(new SnapshotCache(), path)).toBe(false);
    expect(existsSync(path)).toBe(false);
  });

  it("writes and reads back recorded snapshots", async () => {
    const path = join(dir, "__snapshot__", "web_test.yaml.snap");
    const cache = new SnapshotCache();
    cache.record({ suite: "web", test: "renders", ordinal: 1 }, { kind: "Deployment" });

    expect(await saveSnapshotCache(cache, path)).toBe(true);
    expect(existsSync(`${path}.tmp`)).toBe(false);
    expect(yaml.load(await readFile(path, "utf-8"))).toEqual({
      web: { renders: { "1": { kind: "Deployment" } } },
    });

    const loaded = await loadSnapshotCache(path);
    expect(loaded.load({ suite: "web", test: "renders", ordinal: 1 })).toEqual({
      content: { kind: "Deployment" },
    });
  });

  it("rejects a file of the wrong shape", async () => {
    const path = join(dir, "bad.snap");
    await writeFile(path, "- a\n- b\n");
    await expect(loadSnapshotCache(path)).rejects.toThrow(`Invalid snapshot file ${path}:`);
  });
});
