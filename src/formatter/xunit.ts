import type { JobResult, SuiteResult } from "../types/result.js";
import { TOOL_NAME, countAll, countSuite, datePart, jobFailureText, timePart } from "./common.js";
import { XmlWriter, seconds } from "./xml.js";

const RESULT: Record<JobResult["status"], string> = {
  passed: "Pass",
  failed: "Fail",
  skipped: "Skip",
};

const EXCEPTION_TYPE = `${TOOL_NAME}.AssertionFailure`;

function groupByChart(suites: readonly SuiteResult[]): Map<string, SuiteResult[]> {
  const groups = new Map<string, SuiteResult[]>();
  for (const suite of suites) {
    const group = groups.get(suite.chartPath);
    if (group) {
      group.push(suite);
    } else {
      groups.set(suite.chartPath, [suite]);
    }
  }
  return groups;
}

/**
 * xUnit.net v2 result format, one assembly per chart
 */
export function formatXUnit(suites: readonly SuiteResult[]): string {
  const xml = new XmlWriter().open("assemblies");

  for (const [chartPath, chartSuites] of groupByChart(suites)) {
    const total = countAll(chartSuites);
    const startedAt = chartSuites[0].startedAt;
    xml.open("assembly", {
      name: chartPath,
      "test-framework": TOOL_NAME,
      "run-date": datePart(startedAt),
      "run-time": timePart(startedAt),
      total: total.tests,
      passed: total.passed,
      failed: total.failures,
      skipped: total.skipped,
      time: seconds(total.durationMs),
      errors: total.errors,
    });

    const broken = chartSuites.filter((suite) => suite.error !== undefined);
    if (broken.length > 0) {
      xml.open("errors");
      for (const suite of broken) {
        xml
          .open("error", { type: "suite", name: suite.name })
          .open("failure", { "exception-type": EXCEPTION_TYPE })
          .text("message", {}, suite.error ?? "")
          .close()
          .close();
      }
      xml.close();
    }

    for (const suite of chartSuites) {
      const counts = countSuite(suite);
      xml.open("collection", {
        name: suite.name,
        total: counts.tests,
        passed: counts.passed,
        failed: counts.failures,
        skipped: counts.skipped,
        time: seconds(suite.durationMs),
      });

      for (const job of suite.jobs) {
        const attributes = {
          name: job.name,
          type: suite.name,
          method: job.name,
          time: seconds(job.durationMs),
          result: RESULT[job.status],
        };
        if (job.status === "passed") {
          xml.empty("test", attributes);
          continue;
        }
        xml.open("test", attributes);
        if (job.status === "skipped") {
          xml.text("reason", {}, "skipped after an earlier failure");
        } else {
          xml
            .open("failure", { "exception-type": EXCEPTION_TYPE })
            .text("message", {}, jobFailureText(job))
            .close();
        }
        xml.close();
      }

      xml.close();
    }

    xml.close();
  }

  return xml.close().toString();
}
