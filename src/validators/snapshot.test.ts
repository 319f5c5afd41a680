import { describe, it, expect } from "vitest";
import type { Manifest } from "../types/data.js";
import type { ValidateContext } from "./types.js";
import { SnapshotCache, SnapshotComparer } from "../snapshot/index.js";
import { NO_SNAPSHOT_STORE, validateMatchSnapshot, validateMatchSnapshotRaw } from "./snapshot.js";

const deployment: Manifest = {
  index: 0,
  source: "templates/deployment.yaml",
  tree: { kind: "Deployment", spec: { replicas: 3 } },
};

function context(
  cache: SnapshotCache,
  updateMode: boolean,
  overrides: Partial<ValidateContext> = {}
): ValidateContext {
  return {
    manifests: [deployment],
    negative: false,
    failFast: false,
    strict: false,
    snapshot: new SnapshotComparer(cache, "web", "renders", updateMode),
    ...overrides,
  };
}

describe("validateMatchSnapshot", () => {
  it("fails when no snapshot is recorded", () => {
    const result = validateMatchSnapshot({ type: "matchSnapshot" }, context(new SnapshotCache(), false));
    expect(result).toEqual({
      passed: false,
      diagnostics: [
        "DocumentIndex: 0",
        "Error:",
        '  no snapshot recorded for "renders" #1, run with --update-snapshot to record it',
      ],
    });
  });

  it("records a new snapshot in update mode", () => {
    const cache = new SnapshotCache();
    const result = validateMatchSnapshot({ type: "matchSnapshot" }, context(cache, true));
    expect(result.passed).toBe(true);
    expect(cache.stats.created).toBe(1);
    expect(cache.load({ suite: "web", test: "renders", ordinal: 1 })).toEqual({ content: deployment.tree });
  });

  it("passes on a matching snapshot", () => {
    const cache = new SnapshotCache({ web: { renders: { "1": { spec: { replicas: 3 }, kind: "Deployment" } } } });
    const result = validateMatchSnapshot({ type: "matchSnapshot" }, context(cache, false));
    expect(result.passed).toBe(true);
    expect(cache.stats.matched).toBe(1);
  });

  it("reports a changed value", () => {
    const cache = new SnapshotCache({ web: { renders: { "1": 2 } } });
    const result = validateMatchSnapshot({ type: "matchSnapshot", path: "spec.replicas" }, context(cache, false));
    expect(result.diagnostics).toEqual([
      "DocumentIndex: 0",
      "Expected to match snapshot 1:",
      "  2",
      "Actual:",
      "  3",
    ]);
    expect(cache.dirty).toBe(false);
  });

  it("overwrites a changed value in update mode", () => {
    const cache = new SnapshotCache({ web: { renders: { "1": 2 } } });
    const result = validateMatchSnapshot({ type: "matchSnapshot", path: "spec.replicas" }, context(cache, true));
    expect(result.passed).toBe(true);
    expect(cache.stats).toEqual({ matched: 0, mismatched: 0, created: 0, updated: 1 });
    expect(cache.load({ suite: "web", test: "renders", ordinal: 1 })).toEqual({ content: 3 });
  });

  it("reports a path that yields nothing", () => {
    const cache = new SnapshotCache();
    const result = validateMatchSnapshot({ type: "matchSnapshot", path: "spec.missing" }, context(cache, true));
    expect(result).toEqual({
      passed: false,
      diagnostics: ["DocumentIndex: 0", "Error:", "  unknown path spec.missing"],
    });
    expect(cache.dirty).toBe(false);
  });

  it("accepts a path that yields nothing when negated", () => {
    const cache = new SnapshotCache();
    const result = validateMatchSnapshot(
      { type: "matchSnapshot", path: "spec.missing" },
      context(cache, true, { negative: true })
    );
    expect(result.passed).toBe(true);
    expect(cache.stats).toEqual({ matched: 0, mismatched: 0, created: 0, updated: 0 });
  });

  it("never records from a negated assertion", () => {
    const cache = new SnapshotCache();
    const result = validateMatchSnapshot(
      { type: "matchSnapshot" },
      context(cache, true, { negative: true })
    );
    expect(result.passed).toBe(false);
    expect(cache.dirty).toBe(false);
  });

  it("numbers comparisons per document", () => {
    const cache = new SnapshotCache();
    const second: Manifest = { ...deployment, index: 1 };
    validateMatchSnapshot({ type: "matchSnapshot" }, context(cache, true, { manifests: [deployment, second] }));
    expect(cache.toJSON()).toEqual({ web: { renders: { "1": deployment.tree, "2": deployment.tree } } });
  });

  it("fails without a snapshot store", () => {
    const result = validateMatchSnapshot(
      { type: "matchSnapshot" },
      { manifests: [deployment], negative: false, failFast: false, strict: false }
    );
    expect(result.diagnostics).toEqual(["DocumentIndex: 0", "Error:", `  ${NO_SNAPSHOT_STORE}`]);
  });
});

describe("validateMatchSnapshotRaw", () => {
  it("compares raw text", () => {
    const notes: Manifest = { index: 0, source: "templates/NOTES.txt", tree: { raw: "hello" } };
    const cache = new SnapshotCache({ web: { renders: { "1": "hello" } } });
    const result = validateMatchSnapshotRaw({ type: "matchSnapshotRaw" }, context(cache, false, { manifests: [notes] }));
    expect(result.passed).toBe(true);
  });
});
