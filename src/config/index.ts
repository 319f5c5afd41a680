export { resolveRunnerConfig } from './loader.js';
export {
  expandValuesFiles,
  findCharts,
  findTestFiles,
  loadTestSuites,
  resolveFromSuite,
  type LoadedSuite,
  type LoadTestOptions,
} from './test-loader.js';
