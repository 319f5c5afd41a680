import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Command } from 'commander';
import { resolveRunnerConfig } from '../../config/index.js';
import { formatResults } from '../../formatter/index.js';
import { runCharts } from '../../runner/index.js';
import { DEFAULT_TEST_PATTERN, type RunnerConfig, type RunSummary } from '../../types/index.js';
import { errorMessage } from '../../validators/index.js';
import { ConsolePrinter } from '../printer.js';

export interface RunOptions {
  file?: string[];
  values?: string[];
  chartTestsPath?: string;
  updateSnapshot?: boolean;
  withSubchart: boolean;
  outputFile?: string;
  outputType?: string;
  failfast?: boolean;
  strict?: boolean;
  color?: boolean;
  debug?: boolean;
  helm: string;
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

type ChartRunner = typeof runCharts;

/**
 * Run the charts' suites, print the results and write the report.
 * Resolves to the process exit code.
 */
export async function runTests(
  charts: string[],
  options: RunOptions,
  runner: ChartRunner = runCharts
): Promise<number> {
  const printer = new ConsolePrinter({ color: options.color });
  const c = printer.colors;

  let config: RunnerConfig;
  try {
    config = resolveRunnerConfig({
      testFiles: options.file,
      valuesFiles: options.values,
      chartTestsPath: options.chartTestsPath,
      updateSnapshot: options.updateSnapshot,
      withSubChart: options.withSubchart,
      failFast: options.failfast,
      strict: options.strict,
      color: options.color,
      debug: options.debug,
      outputFile: options.outputFile,
      outputType: options.outputType,
      helmBinary: options.helm,
    });
  } catch (err) {
    printer.error(errorMessage(err));
    return 1;
  }

  const startTs = Date.now();
  let summary: RunSummary;
  try {
    summary = await runner({
      config,
      chartPaths: charts,
      onLog: (msg) => console.log(c.yellow(msg)),
      onDebug: config.debug ? (msg) => console.log(c.dim(msg)) : undefined,
      onSuite: (result) => printer.suite(result),
    });
  } catch (err) {
    printer.error(errorMessage(err));
    return 1;
  }
  printer.summary(summary, Date.now() - startTs);

  if (config.outputFile) {
    const reportPath = resolve(config.outputFile);
    try {
      await writeFile(reportPath, formatResults(summary.suites, config.outputType));
    } catch (err) {
      printer.error(`Failed to write report ${reportPath}: ${errorMessage(err)}`);
      return 1;
    }
    if (config.debug) {
      console.log(c.dim(`Report written to ${reportPath}`));
    }
  }

  return summary.passed ? 0 : 1;
}

export const runCommand = new Command('run')
  .description('Run test suites against one or more charts')
  .argument('<charts...>', 'Chart directories')
  .option('-f, --file <glob>', `Test file pattern, relative to the chart (default: ${DEFAULT_TEST_PATTERN})`, collect)
  .option('-v, --values <path>', 'Values file or glob pattern applied to every test', collect)
  .option('--chart-tests-path <path>', 'Chart, relative to the chart under test, that holds and renders the suites')
  .option('-u, --update-snapshot', 'Record new snapshots and overwrite changed ones')
  .option('--no-with-subchart', 'Skip the tests of sub-charts under charts/')
  .option('-o, --output-file <path>', 'Write a report file')
  .option('-t, --output-type <type>', 'Report format: JUnit, NUnit, XUnit, Sonar or JSON')
  .option('-q, --failfast', 'Stop at the first failing assertion')
  .option('--strict', 'Reject unknown keys in test files and non-string raw values')
  .option('--color', 'Force coloured output')
  .option('--no-color', 'Disable coloured output')
  .option('-d, --debug', 'Debug output (helm commands, expected and actual content)')
  .option('--helm <path>', 'Helm binary', process.env.HELM_BIN ?? 'helm')
  .action(async (charts: string[], options: RunOptions) => {
    process.exit(await runTests(charts, options));
  });
