import deepEqual from "fast-deep-equal";
import type { SnapshotStats } from "../types/result.js";

export interface SnapshotKey {
  suite: string;
  test: string;
  /** 1-based count of comparisons made by the test */
  ordinal: number;
}

export interface SnapshotEntry {
  content: unknown;
}

export type SnapshotOutcome = keyof SnapshotStats;

export interface SnapshotStore {
  load(key: SnapshotKey): SnapshotEntry | undefined;
  /** Structural comparison with the stored entry; touches no stats */
  matches(key: SnapshotKey, content: unknown): boolean;
  record(key: SnapshotKey, content: unknown): void;
  /** Count one comparison outcome */
  count(outcome: SnapshotOutcome): void;
}

/** suite → test → ordinal → content */
export type SnapshotTree = Record<string, Record<string, Record<string, unknown>>>;

export function emptyStats(): SnapshotStats {
  return { matched: 0, mismatched: 0, created: 0, updated: 0 };
}

/**
 * In-memory snapshot store. Comparison is structural, so key order in
 * stored documents never causes a mismatch.
 */
export class SnapshotCache implements SnapshotStore {
  readonly stats: SnapshotStats = emptyStats();
  private entries: SnapshotTree;
  private changed = false;

  constructor(entries: SnapshotTree = {}) {
    this.entries = entries;
  }

  get dirty(): boolean {
    return this.changed;
  }

  load(key: SnapshotKey): SnapshotEntry | undefined {
    const tests = this.entries[key.suite];
    if (!tests || !Object.hasOwn(tests, key.test)) {
      return undefined;
    }
    const ordinals = tests[key.test];
    const ordinal = String(key.ordinal);
    if (!Object.hasOwn(ordinals, ordinal)) {
      return undefined;
    }
    return { content: ordinals[ordinal] };
  }

  matches(key: SnapshotKey, content: unknown): boolean {
    const entry = this.load(key);
    return entry !== undefined && deepEqual(entry.content, content);
  }

  count(outcome: SnapshotOutcome): void {
    this.stats[outcome]++;
  }

  record(key: SnapshotKey, content: unknown): void {
    const tests = (this.entries[key.suite] ??= {});
    const ordinals = (tests[key.test] ??= {});
    ordinals[String(key.ordinal)] = content;
    this.changed = true;
  }

  toJSON(): SnapshotTree {
    return this.entries;
  }
}
