import type { JobResult, SuiteResult } from "../types/result.js";
import type { TestJob, TestSuite } from "../types/test.js";
import type { Renderer } from "../renderer/types.js";
import type { SnapshotStore } from "../snapshot/index.js";
import { errorMessage } from "../validators/index.js";
import { runJob, skippedReport, type JobConfig } from "./job.js";

export interface SuiteRunnerOptions {
  suite: TestSuite;
  /** Absolute path of the suite file */
  suiteFilePath: string;
  /** Path shown in reports */
  displayPath: string;
  chartPath: string;
  renderer: Renderer;
  config: JobConfig;
  overrideValues?: string[];
  snapshots?: SnapshotStore;
  onDebug?: (message: string) => void;
}

export function skippedJob(job: TestJob): JobResult {
  return {
    name: job.it,
    status: "skipped",
    durationMs: 0,
    assertions: job.asserts.map((assertion, index) => skippedReport(assertion, index)),
  };
}

/**
 * Result for a suite that was never run; every job is listed as skipped
 */
export function skippedSuite(suite: TestSuite, displayPath: string, chartPath: string): SuiteResult {
  return {
    name: suite.suite,
    filePath: displayPath,
    chartPath,
    passed: false,
    skipped: true,
    startedAt: new Date().toISOString(),
    durationMs: 0,
    jobs: suite.tests.map((job) => skippedJob(job)),
  };
}

/**
 * Run a suite's jobs in order. Under fail-fast the first failing job stops
 * the suite; the remaining jobs are reported as skipped. A renderer that
 * cannot run is fatal for the suite.
 */
export async function runSuite(options: SuiteRunnerOptions): Promise<SuiteResult> {
  const { suite, config } = options;
  const startedAt = new Date();
  const jobs: JobResult[] = [];
  let error: string | undefined;

  for (const job of suite.tests) {
    if (error !== undefined || (config.failFast && jobs.some((j) => j.status === "failed"))) {
      jobs.push(skippedJob(job));
      continue;
    }

    try {
      jobs.push(
        await runJob({
          suite,
          job,
          suiteFilePath: options.suiteFilePath,
          chartPath: options.chartPath,
          renderer: options.renderer,
          config,
          overrideValues: options.overrideValues,
          snapshots: options.snapshots,
          onDebug: options.onDebug,
        })
      );
    } catch (err) {
      error = errorMessage(err);
      jobs.push({ name: job.it, status: "failed", durationMs: 0, assertions: [], error });
    }
  }

  return {
    name: suite.suite,
    filePath: options.displayPath,
    chartPath: options.chartPath,
    passed: error === undefined && jobs.every((j) => j.status === "passed"),
    startedAt: startedAt.toISOString(),
    durationMs: Date.now() - startedAt.getTime(),
    jobs,
    error,
  };
}
