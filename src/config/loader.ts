import {
  RunnerConfigSchema,
  type RunnerConfig,
  type RunnerConfigInput,
} from '../types/index.js';

/**
 * Validate runner options and fill in defaults
 */
export function resolveRunnerConfig(options: RunnerConfigInput = {}): RunnerConfig {
  const result = RunnerConfigSchema.safeParse(options);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Invalid options:\n${errors}`);
  }

  return result.data;
}
