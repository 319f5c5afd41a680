import type { Release, TestJob, TestSuite } from "../types/index.js";
import type { RenderRequest } from "../renderer/types.js";
import { resolveFromSuite } from "../config/index.js";

export const DEFAULT_RELEASE_NAME = "release-name";
export const DEFAULT_NAMESPACE = "namespace";

export interface MergeContext {
  chartPath: string;
  suiteFilePath: string;
  /** Values files from the command line, already absolute */
  overrideValues?: string[];
}

/**
 * Templates declared by a job, if any
 */
function jobTemplates(job: TestJob): string[] | undefined {
  if (job.templates && job.templates.length > 0) {
    return job.templates;
  }
  return job.template ? [job.template] : undefined;
}

/**
 * Merge release settings (job fields override suite fields)
 */
function mergeRelease(...levels: (Release | undefined)[]): Release {
  const merged: Release = {};
  for (const level of levels) {
    if (level?.name !== undefined) {
      merged.name = level.name;
    }
    if (level?.namespace !== undefined) {
      merged.namespace = level.namespace;
    }
  }
  return merged;
}

/**
 * Merge render settings from suite -> job -> command line
 * - Templates: the job's replace the suite's
 * - Values files: extend (suite, then job, then command line)
 * - set and release: job keys override suite keys
 */
export function mergeRenderSettings(
  suite: TestSuite,
  job: TestJob,
  context: MergeContext
): RenderRequest {
  const release = mergeRelease(suite.release, job.release);
  const valuesFiles = [...(suite.values ?? []), ...(job.values ?? [])].map((file) =>
    resolveFromSuite(context.suiteFilePath, file)
  );

  return {
    chartPath: context.chartPath,
    releaseName: release.name ?? DEFAULT_RELEASE_NAME,
    namespace: release.namespace ?? DEFAULT_NAMESPACE,
    templates: jobTemplates(job) ?? suite.templates ?? [],
    valuesFiles: [...valuesFiles, ...(context.overrideValues ?? [])],
    set: { ...suite.set, ...job.set },
  };
}
