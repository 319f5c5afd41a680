import type { Manifest } from "../types/data.js";
import type { RunnerConfig } from "../types/config.js";
import type { AssertionReport, JobResult } from "../types/result.js";
import type { Assertion, TestJob, TestSuite } from "../types/test.js";
import type { Renderer } from "../renderer/types.js";
import { SnapshotComparer, type SnapshotStore } from "../snapshot/index.js";
import { validateAssertion, type ValidateContext } from "../validators/index.js";
import { mergeRenderSettings } from "./merge.js";

export type JobConfig = Pick<RunnerConfig, "failFast" | "strict" | "updateSnapshot">;

export interface JobRunnerOptions {
  suite: TestSuite;
  job: TestJob;
  suiteFilePath: string;
  chartPath: string;
  renderer: Renderer;
  config: JobConfig;
  overrideValues?: string[];
  snapshots?: SnapshotStore;
  onDebug?: (message: string) => void;
}

export function matchesTemplate(source: string, template: string): boolean {
  return source === template || source === `templates/${template}` || source.endsWith(`/${template}`);
}

/**
 * Manifests an assertion sees. Indices are kept, so diagnostics point at
 * the original documents.
 */
export function selectManifests(
  manifests: readonly Manifest[],
  template?: string,
  documentIndex?: number
): Manifest[] {
  return manifests.filter(
    (manifest) =>
      (template === undefined || matchesTemplate(manifest.source, template)) &&
      (documentIndex === undefined || manifest.index === documentIndex)
  );
}

export function skippedReport(assertion: Assertion, index: number): AssertionReport {
  return {
    index,
    name: assertion.name,
    negative: assertion.negative,
    status: "skipped",
    diagnostics: [],
  };
}

/**
 * Render once, then run the job's assertions in declared order
 */
export async function runJob(options: JobRunnerOptions): Promise<JobResult> {
  const { suite, job, renderer, config, snapshots, onDebug } = options;
  const debug = onDebug ?? (() => {});
  const startTs = Date.now();

  const request = mergeRenderSettings(suite, job, {
    chartPath: options.chartPath,
    suiteFilePath: options.suiteFilePath,
    overrideValues: options.overrideValues,
  });
  const rendered = await renderer.render(request);
  const renderError = rendered.ok ? undefined : rendered.error;
  const manifests = rendered.ok ? rendered.manifests : [];
  debug(
    renderError
      ? `[Job] "${job.it}" render error: ${renderError.message}`
      : `[Job] "${job.it}" rendered ${manifests.length} document(s)`
  );

  const snapshot = snapshots
    ? new SnapshotComparer(snapshots, suite.suite, job.it, config.updateSnapshot)
    : undefined;

  const assertions: AssertionReport[] = [];
  let stopped = false;

  for (const [index, assertion] of job.asserts.entries()) {
    if (stopped) {
      assertions.push(skippedReport(assertion, index));
      continue;
    }

    const context: ValidateContext = {
      manifests: selectManifests(
        manifests,
        assertion.template ?? job.template,
        assertion.documentIndex ?? job.documentIndex
      ),
      negative: assertion.negative,
      failFast: config.failFast,
      strict: config.strict,
      renderError,
      snapshot,
      onDebug,
    };

    const result = validateAssertion(assertion, context);
    assertions.push({
      index,
      name: assertion.name,
      negative: assertion.negative,
      status: result.passed ? "passed" : "failed",
      diagnostics: result.diagnostics,
    });

    // Fail fast on the first failing assertion
    if (!result.passed && config.failFast) {
      stopped = true;
    }
  }

  return {
    name: job.it,
    status: assertions.every((a) => a.status === "passed") ? "passed" : "failed",
    durationMs: Date.now() - startTs,
    assertions,
    renderError: renderError?.message,
  };
}
