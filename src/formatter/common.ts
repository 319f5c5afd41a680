import type { JobResult, SuiteResult } from "../types/result.js";

export const TOOL_NAME = "chartcheck";

export interface Counts {
  tests: number;
  passed: number;
  failures: number;
  skipped: number;
  /** Suites that could not run */
  errors: number;
  durationMs: number;
}

export function countSuite(suite: SuiteResult): Counts {
  return {
    tests: suite.jobs.length,
    passed: suite.jobs.filter((job) => job.status === "passed").length,
    failures: suite.jobs.filter((job) => job.status === "failed").length,
    skipped: suite.jobs.filter((job) => job.status === "skipped").length,
    errors: suite.error !== undefined ? 1 : 0,
    durationMs: suite.durationMs,
  };
}

export function countAll(suites: readonly SuiteResult[]): Counts {
  const total: Counts = { tests: 0, passed: 0, failures: 0, skipped: 0, errors: 0, durationMs: 0 };
  for (const suite of suites) {
    const counts = countSuite(suite);
    total.tests += counts.tests;
    total.passed += counts.passed;
    total.failures += counts.failures;
    total.skipped += counts.skipped;
    total.errors += counts.errors;
    total.durationMs += counts.durationMs;
  }
  return total;
}

/**
 * Failure details of a job: the job error, then each failed assertion
 * followed by its diagnostics
 */
export function jobFailureText(job: JobResult): string {
  const lines: string[] = [];
  if (job.error !== undefined) {
    lines.push(`Error: ${job.error}`);
  }
  for (const assertion of job.assertions) {
    if (assertion.status !== "failed") continue;
    lines.push(`- asserts[${assertion.index}] \`${assertion.name}\` fail`);
    lines.push(...assertion.diagnostics.map((line) => `    ${line}`));
  }
  return lines.join("\n");
}

/** `2024-01-02T03:04:05.678Z` → `2024-01-02` */
export function datePart(iso: string): string {
  return iso.slice(0, 10);
}

/** `2024-01-02T03:04:05.678Z` → `03:04:05` */
export function timePart(iso: string): string {
  return iso.slice(11, 19);
}
