import type { SuiteResult } from "../types/result.js";
import { TOOL_NAME, countAll, countSuite, jobFailureText } from "./common.js";
import { XmlWriter, seconds } from "./xml.js";

export function formatJUnit(suites: readonly SuiteResult[]): string {
  const total = countAll(suites);
  const xml = new XmlWriter().open("testsuites", {
    name: TOOL_NAME,
    tests: total.tests,
    failures: total.failures,
    errors: total.errors,
    skipped: total.skipped,
    time: seconds(total.durationMs),
  });

  for (const suite of suites) {
    const counts = countSuite(suite);
    xml.open("testsuite", {
      name: suite.name,
      tests: counts.tests,
      failures: counts.failures,
      errors: counts.errors,
      skipped: counts.skipped,
      time: seconds(suite.durationMs),
      // JUnit timestamps carry no zone
      timestamp: suite.startedAt.slice(0, 19),
      file: suite.filePath,
    });

    if (suite.error !== undefined) {
      xml.text("system-err", {}, suite.error);
    }

    for (const job of suite.jobs) {
      const attributes = { name: job.name, classname: suite.name, time: seconds(job.durationMs) };
      if (job.status === "passed") {
        xml.empty("testcase", attributes);
        continue;
      }
      xml.open("testcase", attributes);
      if (job.status === "skipped") {
        xml.empty("skipped");
      } else if (job.error !== undefined) {
        xml.text("error", { message: job.error }, jobFailureText(job));
      } else {
        xml.text("failure", { message: "Failed", type: "" }, jobFailureText(job));
      }
      xml.close();
    }

    xml.close();
  }

  return xml.close().toString();
}
