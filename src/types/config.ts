import { z } from "zod";

export const OUTPUT_FORMATS = ["JUnit", "NUnit", "XUnit", "Sonar", "JSON"] as const;

export const DEFAULT_TEST_PATTERN = "tests/*_test.yaml";

// Output type names are matched case-insensitively
const OutputFormatSchema = z.preprocess(
  (value) =>
    typeof value === "string"
      ? OUTPUT_FORMATS.find((format) => format.toLowerCase() === value.toLowerCase()) ?? value
      : value,
  z.enum(OUTPUT_FORMATS)
);

export const RunnerConfigSchema = z.object({
  testFiles: z.array(z.string()).min(1).default([DEFAULT_TEST_PATTERN]),
  // Plain paths or glob patterns, relative to the working directory
  valuesFiles: z.array(z.string()).default([]),
  // Chart next to the chart under test that holds and renders the suites
  chartTestsPath: z.string().min(1).optional(),
  updateSnapshot: z.boolean().default(false),
  withSubChart: z.boolean().default(true),
  failFast: z.boolean().default(false),
  strict: z.boolean().default(false),
  // undefined: follow terminal support
  color: z.boolean().optional(),
  debug: z.boolean().default(false),
  outputFile: z.string().min(1).optional(),
  outputType: OutputFormatSchema.default("XUnit"),
  helmBinary: z.string().min(1).default("helm"),
}).strict();

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
export type RunnerConfig = z.infer<typeof RunnerConfigSchema>;
export type RunnerConfigInput = z.input<typeof RunnerConfigSchema>;
