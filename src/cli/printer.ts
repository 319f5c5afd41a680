import pc from 'picocolors';
import type { RunSummary, SuiteResult } from '../types/index.js';
import { countAll, jobFailureText } from '../formatter/index.js';

type Colors = ReturnType<typeof pc.createColors>;

export interface PrinterOptions {
  /** Force colours on or off; terminal support decides when unset */
  color?: boolean;
  write?: (line: string) => void;
}

function indent(text: string, prefix: string): string[] {
  return text.split('\n').map((line) => `${prefix}${line}`);
}

/**
 * Console report: one block per suite as it finishes, then totals
 */
export class ConsolePrinter {
  readonly colors: Colors;
  private write: (line: string) => void;

  constructor(options: PrinterOptions = {}) {
    this.colors = pc.createColors(options.color ?? pc.isColorSupported);
    this.write = options.write ?? ((line) => console.log(line));
  }

  suite(result: SuiteResult): void {
    const c = this.colors;
    if (result.skipped) {
      this.write(`${c.yellow(c.bold(' SKIP '))} ${result.name}\t${c.dim(result.filePath)}`);
      return;
    }
    const status = result.passed ? c.green(c.bold(' PASS ')) : c.red(c.bold(' FAIL '));
    this.write(`${status} ${result.name}\t${c.dim(result.filePath)}`);

    if (result.error !== undefined) {
      this.write(`  ${c.red('Error:')}`);
      for (const line of indent(result.error, '    ')) {
        this.write(c.red(line));
      }
    }

    for (const job of result.jobs) {
      if (job.status === 'failed') {
        this.write(c.red(`  - ${job.name}`));
        const details = jobFailureText(job);
        if (details !== '') {
          for (const line of indent(details, '      ')) {
            this.write(line);
          }
        }
      } else if (job.status === 'skipped') {
        this.write(c.dim(`  - ${job.name} (skipped)`));
      }
    }
  }

  summary(summary: RunSummary, durationMs: number): void {
    const c = this.colors;
    const total = countAll(summary.suites);
    const passedSuites = summary.suites.filter((s) => s.passed).length;
    const skippedSuites = summary.suites.filter((s) => s.skipped).length;
    const failedSuites = summary.suites.length - passedSuites - skippedSuites;

    const parts = (passed: number, failed: number, skipped: number, all: number): string =>
      [
        c.green(`${passed} passed`),
        failed > 0 ? c.red(`${failed} failed`) : undefined,
        skipped > 0 ? c.yellow(`${skipped} skipped`) : undefined,
        `${all} total`,
      ]
        .filter((part): part is string => part !== undefined)
        .join(', ');

    this.write('');
    this.write(`${c.bold('Test Suites:')} ${parts(passedSuites, failedSuites, skippedSuites, summary.suites.length)}`);
    this.write(`${c.bold('Tests:      ')} ${parts(total.passed, total.failures, total.skipped, total.tests)}`);

    const { matched, mismatched, created, updated } = summary.snapshot;
    if (matched + mismatched + created + updated > 0) {
      this.write(
        `${c.bold('Snapshot:   ')} ${created} created, ${updated} updated, ${matched} passed, ${mismatched} failed`
      );
    }
    this.write(`${c.bold('Time:       ')} ${durationMs}ms`);
  }

  error(message: string): void {
    this.write(`${this.colors.red('Error:')} ${message}`);
  }
}
