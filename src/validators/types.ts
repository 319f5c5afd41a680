import type { Manifest } from "../types/data.js";
import type { SnapshotComparer } from "../snapshot/comparer.js";

export interface ValidationResult {
  passed: boolean;
  diagnostics: string[];
}

/**
 * State one assertion is evaluated against. Built by the job runner and
 * never mutated by a validator.
 */
export interface ValidateContext {
  manifests: readonly Manifest[];
  /** Flips the polarity of each individual match */
  negative: boolean;
  /** Stop at the first failing manifest */
  failFast: boolean;
  /** Reject non-string values where a string is read */
  strict: boolean;
  renderError?: Error;
  snapshot?: SnapshotComparer;
  onDebug?: (message: string) => void;
}
