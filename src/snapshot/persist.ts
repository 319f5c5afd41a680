import { existsSync } from "node:fs";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { SnapshotCache } from "./store.js";

export const SNAPSHOT_DIR = "__snapshot__";

const SnapshotFileSchema = z.record(z.record(z.record(z.unknown())));

/**
 * Snapshot file belonging to a test suite file
 */
export function getSnapshotPath(testFilePath: string): string {
  return join(dirname(testFilePath), SNAPSHOT_DIR, `${basename(testFilePath)}.snap`);
}

/**
 * Load a snapshot file; a missing file gives an empty cache
 */
export async function loadSnapshotCache(filePath: string): Promise<SnapshotCache> {
  if (!existsSync(filePath)) {
    return new SnapshotCache();
  }

  const content = await readFile(filePath, "utf-8");
  const raw = yaml.load(content) ?? {};

  const result = SnapshotFileSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid snapshot file ${filePath}:\n${errors}`);
  }

  return new SnapshotCache(result.data);
}

/**
 * Write the cache if anything was recorded. Goes through a temporary file
 * so an interrupted write leaves the previous file intact.
 */
export async function saveSnapshotCache(cache: SnapshotCache, filePath: string): Promise<boolean> {
  if (!cache.dirty) {
    return false;
  }

  await mkdir(dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp`;
  await writeFile(tempPath, yaml.dump(cache.toJSON(), { noRefs: true }));
  await rename(tempPath, filePath);
  return true;
}
