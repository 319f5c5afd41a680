import type { JobResult, SuiteResult } from "../types/result.js";
import { TOOL_NAME, countAll, datePart, jobFailureText, timePart } from "./common.js";
import { XmlWriter, seconds } from "./xml.js";

const RESULT: Record<JobResult["status"], string> = {
  passed: "Success",
  failed: "Failure",
  skipped: "Ignored",
};

/**
 * NUnit 2.5 result format
 */
export function formatNUnit(suites: readonly SuiteResult[]): string {
  const total = countAll(suites);
  const startedAt = suites[0]?.startedAt;

  const xml = new XmlWriter().open("test-results", {
    name: TOOL_NAME,
    total: total.tests,
    errors: total.errors,
    failures: total.failures,
    "not-run": total.skipped,
    inconclusive: 0,
    ignored: total.skipped,
    skipped: 0,
    invalid: 0,
    date: startedAt !== undefined ? datePart(startedAt) : undefined,
    time: startedAt !== undefined ? timePart(startedAt) : undefined,
  });

  for (const suite of suites) {
    xml
      .open("test-suite", {
        type: "TestSuite",
        name: suite.name,
        executed: suite.skipped ? "False" : "True",
        result: suite.skipped ? "Ignored" : suite.passed ? "Success" : "Failure",
        success: suite.skipped ? undefined : suite.passed ? "True" : "False",
        time: seconds(suite.durationMs),
      })
      .open("results");

    if (suite.error !== undefined) {
      xml
        .open("test-case", { name: suite.name, executed: "False", result: "Error", success: "False" })
        .open("failure")
        .text("message", {}, suite.error)
        .close()
        .close();
    }

    for (const job of suite.jobs) {
      const executed = job.status !== "skipped";
      const attributes = {
        name: `${suite.name}.${job.name}`,
        executed: executed ? "True" : "False",
        result: RESULT[job.status],
        success: executed ? (job.status === "passed" ? "True" : "False") : undefined,
        time: executed ? seconds(job.durationMs) : undefined,
        asserts: job.assertions.length,
      };

      if (job.status === "passed") {
        xml.empty("test-case", attributes);
        continue;
      }
      xml.open("test-case", attributes);
      if (job.status === "skipped") {
        xml.open("reason").text("message", {}, "skipped after an earlier failure").close();
      } else {
        xml.open("failure").text("message", {}, jobFailureText(job)).close();
      }
      xml.close();
    }

    xml.close().close();
  }

  return xml.close().toString();
}
