import type { SnapshotKey, SnapshotOutcome, SnapshotStore } from "./store.js";

export type SnapshotStatus = "matched" | "mismatched" | "missing" | "created" | "updated";

export interface SnapshotComparison {
  status: SnapshotStatus;
  key: SnapshotKey;
  /** Content stored before this comparison, when there was any */
  stored?: unknown;
}

// A missing snapshot counts as a failed comparison
const OUTCOMES: Record<SnapshotStatus, SnapshotOutcome> = {
  matched: "matched",
  mismatched: "mismatched",
  missing: "mismatched",
  created: "created",
  updated: "updated",
};

export interface CompareOptions {
  /** Never write, even in update mode */
  readonly?: boolean;
}

/**
 * Binds a store to one test job and numbers its comparisons in order
 */
export class SnapshotComparer {
  private ordinal = 0;

  constructor(
    private readonly store: SnapshotStore,
    private readonly suite: string,
    private readonly test: string,
    private readonly updateMode: boolean
  ) {}

  compare(content: unknown, options: CompareOptions = {}): SnapshotComparison {
    const comparison = this.resolve(content, options);
    this.store.count(OUTCOMES[comparison.status]);
    return comparison;
  }

  private resolve(content: unknown, options: CompareOptions): SnapshotComparison {
    this.ordinal++;
    const key: SnapshotKey = { suite: this.suite, test: this.test, ordinal: this.ordinal };
    const writable = this.updateMode && !options.readonly;

    const entry = this.store.load(key);
    if (entry === undefined) {
      if (writable) {
        this.store.record(key, content);
        return { status: "created", key };
      }
      return { status: "missing", key };
    }

    if (this.store.matches(key, content)) {
      return { status: "matched", key, stored: entry.content };
    }
    if (writable) {
      this.store.record(key, content);
      return { status: "updated", key, stored: entry.content };
    }
    return { status: "mismatched", key, stored: entry.content };
  }
}
