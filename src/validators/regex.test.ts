import { describe, it, expect } from "vitest";
import type { Manifest } from "../types/data.js";
import type { ValidateContext } from "./types.js";
import { validateMatchRegex, validateMatchRegexRaw } from "./regex.js";

function manifest(tree: Record<string, unknown>, index = 0): Manifest {
  return { index, source: "templates/deployment.yaml", tree };
}

function context(manifests: Manifest[], overrides: Partial<ValidateContext> = {}): ValidateContext {
  return { manifests, negative: false, failFast: false, strict: false, ...overrides };
}

const deployment = manifest({ metadata: { name: "web-frontend" }, spec: { replicas: 3 } });

describe("validateMatchRegex", () => {
  it("searches the value", () => {
    const result = validateMatchRegex(
      { type: "matchRegex", path: "metadata.name", pattern: "front" },
      context([deployment])
    );
    expect(result.passed).toBe(true);
  });

  it("supports flags", () => {
    const result = validateMatchRegex(
      { type: "matchRegex", path: "metadata.name", pattern: "/^WEB/i" },
      context([deployment])
    );
    expect(result.passed).toBe(true);
  });

  it("reports a value that does not match", () => {
    const result = validateMatchRegex(
      { type: "matchRegex", path: "metadata.name", pattern: "^api" },
      context([deployment])
    );
    expect(result.diagnostics).toEqual([
      "DocumentIndex: 0",
      "Path: metadata.name",
      "Expected to match:",
      "  ^api",
      "Actual:",
      "  web-frontend",
    ]);
  });

  it("fails a negated match", () => {
    const result = validateMatchRegex(
      { type: "matchRegex", path: "metadata.name", pattern: "^web" },
      context([deployment], { negative: true })
    );
    expect(result.diagnostics).toEqual([
      "DocumentIndex: 0",
      "Path: metadata.name",
      "Expected NOT to match:",
      "  ^web",
    ]);
  });

  it("reports an invalid pattern as an error", () => {
    const result = validateMatchRegex(
      { type: "matchRegex", path: "metadata.name", pattern: "(" },
      context([deployment])
    );
    expect(result.passed).toBe(false);
    expect(result.diagnostics[0]).toBe("Error:");
  });

  it("stringifies numbers in lenient mode", () => {
    const result = validateMatchRegex(
      { type: "matchRegex", path: "spec.replicas", pattern: "^3$" },
      context([deployment])
    );
    expect(result.passed).toBe(true);
  });

  it("rejects numbers in strict mode", () => {
    const result = validateMatchRegex(
      { type: "matchRegex", path: "spec.replicas", pattern: "^3$" },
      context([deployment], { strict: true })
    );
    expect(result.diagnostics).toEqual([
      "DocumentIndex: 0",
      "Error:",
      "  expected spec.replicas to be a string, got number",
    ]);
  });
});

describe("validateMatchRegexRaw", () => {
  const notes = manifest({ raw: "Visit http://example.test to get started" });

  it("matches raw text", () => {
    const result = validateMatchRegexRaw({ type: "matchRegexRaw", pattern: "http://[a-z.]+" }, context([notes]));
    expect(result.passed).toBe(true);
  });

  it("reports raw text that does not match", () => {
    const result = validateMatchRegexRaw({ type: "matchRegexRaw", pattern: "^Bye" }, context([notes]));
    expect(result.diagnostics).toEqual([
      "DocumentIndex: 0",
      "Expected to match:",
      "  ^Bye",
      "Actual:",
      "  Visit http://example.test to get started",
    ]);
  });
});
