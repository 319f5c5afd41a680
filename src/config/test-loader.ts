import { readFileSync, existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import fg from 'fast-glob';
import yaml from 'js-yaml';
import {
  StrictTestSuiteSchema,
  TestSuiteSchema,
  type TestSuite,
} from '../types/index.js';

export interface LoadedSuite {
  suite: TestSuite;
  filePath: string;
}

export interface LoadTestOptions {
  strict?: boolean;
}

/**
 * Load and validate every suite of a test file (suites are separated by ---)
 */
export function loadTestSuites(filePath: string, options: LoadTestOptions = {}): LoadedSuite[] {
  if (!existsSync(filePath)) {
    throw new Error(`Test file not found: ${filePath}`);
  }

  const content = readFileSync(filePath, 'utf-8');
  let documents: unknown[];
  try {
    documents = yaml.loadAll(content).filter((doc) => doc !== null && doc !== undefined);
  } catch (err) {
    throw new Error(
      `Invalid test file ${filePath}:\n  - ${err instanceof Error ? err.message : String(err)}`
    );
  }

  if (documents.length === 0) {
    throw new Error(`Invalid test file ${filePath}:\n  - file holds no test suite`);
  }

  const schema = options.strict ? StrictTestSuiteSchema : TestSuiteSchema;
  return documents.map((raw, docIndex) => {
    const result = schema.safeParse(raw);
    if (!result.success) {
      const prefix = documents.length > 1 ? `[${docIndex}].` : '';
      const errors = result.error.errors
        .map((e) => `  - ${prefix}${e.path.join('.')}: ${e.message}`)
        .join('\n');
      throw new Error(`Invalid test file ${filePath}:\n${errors}`);
    }
    return { suite: result.data, filePath };
  });
}

/**
 * Find test files matching glob patterns
 */
export async function findTestFiles(
  patterns: string[],
  cwd: string
): Promise<string[]> {
  const files: string[] = [];

  for (const pattern of patterns) {
    const matches = await fg(pattern, { cwd, onlyFiles: true });
    for (const match of matches) {
      files.push(resolve(cwd, match));
    }
  }

  return [...new Set(files)].sort();
}

/**
 * Expand values file arguments. Glob patterns yield their matches in
 * sorted order; plain paths are kept as given, so a missing file is
 * reported by the renderer.
 */
export async function expandValuesFiles(patterns: string[], cwd: string): Promise<string[]> {
  const files: string[] = [];

  for (const pattern of patterns) {
    if (!fg.isDynamicPattern(pattern)) {
      files.push(resolve(cwd, pattern));
      continue;
    }
    const matches = await fg(pattern, { cwd, onlyFiles: true });
    for (const match of matches.sort()) {
      files.push(resolve(cwd, match));
    }
  }

  return [...new Set(files)];
}

/**
 * The chart itself plus, when requested, the charts under its charts/ directory
 */
export async function findCharts(chartPath: string, withSubCharts: boolean): Promise<string[]> {
  const charts = [resolve(chartPath)];
  if (withSubCharts) {
    const subCharts = await fg('charts/*/Chart.yaml', { cwd: chartPath, onlyFiles: true });
    for (const chartFile of subCharts.sort()) {
      charts.push(resolve(chartPath, dirname(chartFile)));
    }
  }
  return charts;
}

/**
 * Resolve a path from a suite file against the suite's directory
 */
export function resolveFromSuite(suiteFilePath: string, path: string): string {
  return resolve(dirname(suiteFilePath), path);
}
