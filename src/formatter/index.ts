import type { OutputFormat } from "../types/config.js";
import type { SuiteResult } from "../types/result.js";
import { formatJUnit } from "./junit.js";
import { formatNUnit } from "./nunit.js";
import { formatSonar } from "./sonar.js";
import { formatXUnit } from "./xunit.js";

export { escapeXml, seconds, XmlWriter } from "./xml.js";
export { jobFailureText, countAll, countSuite, type Counts } from "./common.js";

export function formatJson(suites: readonly SuiteResult[]): string {
  return `${JSON.stringify({ passed: suites.every((s) => s.passed), suites }, null, 2)}\n`;
}

/**
 * Render a result tree as a report file body
 */
export function formatResults(suites: readonly SuiteResult[], format: OutputFormat): string {
  switch (format) {
    case "JUnit":
      return formatJUnit(suites);
    case "NUnit":
      return formatNUnit(suites);
    case "XUnit":
      return formatXUnit(suites);
    case "Sonar":
      return formatSonar(suites);
    case "JSON":
      return formatJson(suites);
    default: {
      const exhaustive: never = format;
      throw new Error(`Unknown output type: ${String(exhaustive)}`);
    }
  }
}
