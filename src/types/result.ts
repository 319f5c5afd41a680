export type TestStatus = 'passed' | 'failed' | 'skipped';

export interface AssertionReport {
  index: number;
  name: string;
  negative: boolean;
  status: TestStatus;
  diagnostics: string[];
}

export interface JobResult {
  name: string;
  status: TestStatus;
  durationMs: number;
  assertions: AssertionReport[];
  renderError?: string;
  error?: string;
}

export interface SuiteResult {
  name: string;
  filePath: string;
  chartPath: string;
  passed: boolean;
  /** ISO-8601 timestamp */
  startedAt: string;
  durationMs: number;
  jobs: JobResult[];
  error?: string;
  /** Not run because an earlier suite failed under fail-fast */
  skipped?: boolean;
}

export interface SnapshotStats {
  matched: number;
  mismatched: number;
  created: number;
  updated: number;
}

export interface RunSummary {
  passed: boolean;
  suites: SuiteResult[];
  snapshot: SnapshotStats;
}
