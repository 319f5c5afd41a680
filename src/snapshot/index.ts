export {
  SnapshotCache,
  emptyStats,
  type SnapshotEntry,
  type SnapshotKey,
  type SnapshotOutcome,
  type SnapshotStore,
  type SnapshotTree,
} from "./store.js";

export {
  SnapshotComparer,
  type CompareOptions,
  type SnapshotComparison,
  type SnapshotStatus,
} from "./comparer.js";

export { SNAPSHOT_DIR, getSnapshotPath, loadSnapshotCache, saveSnapshotCache } from "./persist.js";
