export { runCharts, failedFile, type ChartRunnerOptions } from "./charts.js";
export { runSuite, skippedJob, skippedSuite, type SuiteRunnerOptions } from "./suite.js";
export {
  runJob,
  matchesTemplate,
  selectManifests,
  type JobConfig,
  type JobRunnerOptions,
} from "./job.js";
export {
  mergeRenderSettings,
  DEFAULT_NAMESPACE,
  DEFAULT_RELEASE_NAME,
  type MergeContext,
} from "./merge.js";
