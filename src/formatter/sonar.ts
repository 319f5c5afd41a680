import type { SuiteResult } from "../types/result.js";
import { jobFailureText } from "./common.js";
import { XmlWriter } from "./xml.js";

/**
 * Sonar generic test execution format, one file element per test file
 */
export function formatSonar(suites: readonly SuiteResult[]): string {
  const byFile = new Map<string, SuiteResult[]>();
  for (const suite of suites) {
    byFile.set(suite.filePath, [...(byFile.get(suite.filePath) ?? []), suite]);
  }

  const xml = new XmlWriter().open("testExecutions", { version: 1 });
  for (const [filePath, fileSuites] of byFile) {
    xml.open("file", { path: filePath });
    for (const suite of fileSuites) {
      if (suite.error !== undefined) {
        xml
          .open("testCase", { name: suite.name, duration: 0 })
          .text("error", { message: "Suite could not run" }, suite.error)
          .close();
      }
      for (const job of suite.jobs) {
        const attributes = { name: `${suite.name} - ${job.name}`, duration: Math.round(job.durationMs) };
        if (job.status === "passed") {
          xml.empty("testCase", attributes);
          continue;
        }
        xml.open("testCase", attributes);
        if (job.status === "skipped") {
          xml.empty("skipped", { message: "skipped after an earlier failure" });
        } else {
          xml.text("failure", { message: "Failed" }, jobFailureText(job));
        }
        xml.close();
      }
    }
    xml.close();
  }

  return xml.close().toString();
}
