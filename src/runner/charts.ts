import { relative, resolve } from "node:path";
import type { RunnerConfig } from "../types/config.js";
import type { RunSummary, SnapshotStats, SuiteResult } from "../types/result.js";
import type { Renderer } from "../renderer/types.js";
import { HelmRenderer } from "../renderer/index.js";
import {
  expandValuesFiles,
  findCharts,
  findTestFiles,
  loadTestSuites,
  type LoadedSuite,
} from "../config/index.js";
import {
  emptyStats,
  getSnapshotPath,
  loadSnapshotCache,
  saveSnapshotCache,
  type SnapshotCache,
} from "../snapshot/index.js";
import { errorMessage } from "../validators/index.js";
import { runSuite, skippedSuite } from "./suite.js";

export interface ChartRunnerOptions {
  config: RunnerConfig;
  chartPaths: string[];
  /** Defaults to the helm binary named in the config */
  renderer?: Renderer;
  cwd?: string;
  onLog?: (message: string) => void;
  onDebug?: (message: string) => void;
  /** Called as soon as a suite has finished */
  onSuite?: (result: SuiteResult) => void;
}

interface FileRunOptions {
  filePath: string;
  chartPath: string;
  displayPath: string;
  renderer: Renderer;
  config: RunnerConfig;
  overrideValues: string[];
  /** List the file's suites as skipped instead of running them */
  skip: boolean;
  onDebug?: (message: string) => void;
  onSuite?: (result: SuiteResult) => void;
}

function addStats(total: SnapshotStats, stats: SnapshotStats): void {
  total.matched += stats.matched;
  total.mismatched += stats.mismatched;
  total.created += stats.created;
  total.updated += stats.updated;
}

/**
 * Result for a test file that could not be used at all
 */
export function failedFile(displayPath: string, chartPath: string, error: string): SuiteResult {
  return {
    name: displayPath,
    filePath: displayPath,
    chartPath,
    passed: false,
    startedAt: new Date().toISOString(),
    durationMs: 0,
    jobs: [],
    error,
  };
}

/**
 * Result for a test file that was never run and could not be listed
 */
function skippedFile(displayPath: string, chartPath: string): SuiteResult {
  return {
    name: displayPath,
    filePath: displayPath,
    chartPath,
    passed: false,
    skipped: true,
    startedAt: new Date().toISOString(),
    durationMs: 0,
    jobs: [],
  };
}

/**
 * List the suites of a test file without running them
 */
function skipTestFile(options: FileRunOptions): SuiteResult[] {
  const { filePath, chartPath, displayPath } = options;
  let loaded: LoadedSuite[];
  try {
    loaded = loadTestSuites(filePath, { strict: options.config.strict });
  } catch (err) {
    options.onDebug?.(`[Runner] ${displayPath}: not listed: ${errorMessage(err)}`);
    return [skippedFile(displayPath, chartPath)];
  }
  return loaded.map(({ suite }) => skippedSuite(suite, displayPath, chartPath));
}

/**
 * Run every suite of one test file against a shared snapshot cache,
 * then persist the cache
 */
async function runTestFile(
  options: FileRunOptions
): Promise<{ suites: SuiteResult[]; stats: SnapshotStats }> {
  const { filePath, chartPath, displayPath, config } = options;
  const debug = options.onDebug ?? (() => {});
  const report = (result: SuiteResult): SuiteResult => {
    options.onSuite?.(result);
    return result;
  };

  if (options.skip) {
    return { suites: skipTestFile(options).map(report), stats: emptyStats() };
  }

  let loaded: LoadedSuite[];
  let cache: SnapshotCache;
  const snapshotPath = getSnapshotPath(filePath);
  try {
    loaded = loadTestSuites(filePath, { strict: config.strict });
    cache = await loadSnapshotCache(snapshotPath);
  } catch (err) {
    return { suites: [report(failedFile(displayPath, chartPath, errorMessage(err)))], stats: emptyStats() };
  }
  debug(`[Runner] ${displayPath}: ${loaded.length} suite(s)`);

  const suites: SuiteResult[] = [];
  for (const { suite } of loaded) {
    if (config.failFast && suites.some((s) => !s.passed)) {
      suites.push(report(skippedSuite(suite, displayPath, chartPath)));
      continue;
    }
    const result = await runSuite({
      suite,
      suiteFilePath: filePath,
      displayPath,
      chartPath,
      renderer: options.renderer,
      config,
      overrideValues: options.overrideValues,
      snapshots: cache,
      onDebug: options.onDebug,
    });
    suites.push(result);
    report(result);
  }

  try {
    if (await saveSnapshotCache(cache, snapshotPath)) {
      debug(`[Snapshot] Wrote ${snapshotPath}`);
    }
  } catch (err) {
    const error = `Failed to write snapshot file ${snapshotPath}: ${errorMessage(err)}`;
    suites.push(report(failedFile(displayPath, chartPath, error)));
  }

  return { suites, stats: cache.stats };
}

/**
 * Discover charts and their test files, then run every suite.
 * Test file patterns are matched relative to each chart directory, or to
 * its tests chart when `chartTestsPath` is set. Under fail-fast, suites
 * after the first failure are listed as skipped.
 */
export async function runCharts(options: ChartRunnerOptions): Promise<RunSummary> {
  const { config } = options;
  const cwd = options.cwd ?? process.cwd();
  const log = options.onLog ?? (() => {});
  const debug = options.onDebug ?? (() => {});
  const renderer =
    options.renderer ?? new HelmRenderer({ helmBinary: config.helmBinary, onDebug: options.onDebug });
  const overrideValues = await expandValuesFiles(config.valuesFiles, cwd);

  const suites: SuiteResult[] = [];
  const snapshot = emptyStats();
  const stopped = () => config.failFast && suites.some((s) => !s.passed);

  for (const chartPath of options.chartPaths) {
    const charts = await findCharts(resolve(cwd, chartPath), config.withSubChart);
    for (const chart of charts) {
      const testChart = config.chartTestsPath !== undefined ? resolve(chart, config.chartTestsPath) : chart;
      const testFiles = await findTestFiles(config.testFiles, testChart);
      debug(`[Runner] ${relative(cwd, testChart) || "."}: ${testFiles.length} test file(s)`);
      if (testFiles.length === 0 && chart === charts[0]) {
        log(`No test files found in ${chartPath}`);
      }

      for (const filePath of testFiles) {
        const result = await runTestFile({
          filePath,
          chartPath: testChart,
          displayPath: relative(cwd, filePath),
          renderer,
          config,
          overrideValues,
          skip: stopped(),
          onDebug: options.onDebug,
          onSuite: options.onSuite,
        });
        suites.push(...result.suites);
        addStats(snapshot, result.stats);
      }
    }
  }

  return {
    passed: suites.every((s) => s.passed),
    suites,
    snapshot,
  };
}
