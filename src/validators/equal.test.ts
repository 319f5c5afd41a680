import { describe, it, expect } from "vitest";
import type { Manifest } from "../types/data.js";
import type { ValidateContext } from "./types.js";
import { validateEqual, validateEqualRaw } from "./equal.js";

function manifest(tree: Record<string, unknown>, index = 0): Manifest {
  return { index, source: "templates/deployment.yaml", tree };
}

function context(manifests: Manifest[], overrides: Partial<ValidateContext> = {}): ValidateContext {
  return { manifests, negative: false, failFast: false, strict: false, ...overrides };
}

const deployment = manifest({
  kind: "Deployment",
  metadata: { name: "web", labels: { app: "web" } },
  spec: {
    replicas: 3,
    containers: [{ image: "nginx" }, { image: "busybox" }],
  },
});

describe("validateEqual", () => {
  it("passes on an equal scalar", () => {
    const result = validateEqual({ type: "equal", path: "spec.replicas", value: 3 }, context([deployment]));
    expect(result).toEqual({ passed: true, diagnostics: [] });
  });

  it("compares mappings structurally", () => {
    const result = validateEqual(
      { type: "equal", path: "metadata", value: { labels: { app: "web" }, name: "web" } },
      context([deployment])
    );
    expect(result.passed).toBe(true);
  });

  it("reports expected and actual values", () => {
    const result = validateEqual({ type: "equal", path: "spec.replicas", value: 2 }, context([deployment]));
    expect(result).toEqual({
      passed: false,
      diagnostics: [
        "DocumentIndex: 0",
        "Path: spec.replicas",
        "Expected to equal:",
        "  2",
        "Actual:",
        "  3",
      ],
    });
  });

  it("fails a negated match without the actual value", () => {
    const result = validateEqual(
      { type: "equal", path: "spec.replicas", value: 3 },
      context([deployment], { negative: true })
    );
    expect(result.diagnostics).toEqual([
      "DocumentIndex: 0",
      "Path: spec.replicas",
      "Expected NOT to equal:",
      "  3",
    ]);
  });

  it("names the failing value when a path yields several", () => {
    const result = validateEqual(
      { type: "equal", path: "spec.containers[*].image", value: "nginx" },
      context([deployment])
    );
    expect(result.diagnostics).toEqual([
      "DocumentIndex: 0",
      "ValuesIndex: 1",
      "Path: spec.containers[*].image",
      "Expected to equal:",
      "  nginx",
      "Actual:",
      "  busybox",
    ]);
  });

  it("fails when one of several documents differs", () => {
    const other = manifest({ spec: { replicas: 1 } }, 1);
    const result = validateEqual(
      { type: "equal", path: "spec.replicas", value: 3 },
      context([deployment, other])
    );
    expect(result.passed).toBe(false);
    expect(result.diagnostics[0]).toBe("DocumentIndex: 1");
  });

  it("sends expected and actual content to the debug log", () => {
    const messages: string[] = [];
    validateEqual(
      { type: "equal", path: "spec.replicas", value: 2 },
      context([deployment], { onDebug: (message) => messages.push(message) })
    );
    expect(messages).toEqual(["[equal] expected content: 2", "[equal] actual content: 3"]);
  });
});

describe("validateEqualRaw", () => {
  const notes = manifest({ raw: "Thank you for installing" });

  it("passes on equal text", () => {
    const result = validateEqualRaw({ type: "equalRaw", value: "Thank you for installing" }, context([notes]));
    expect(result.passed).toBe(true);
  });

  it("reports different text", () => {
    const result = validateEqualRaw({ type: "equalRaw", value: "Bye" }, context([notes]));
    expect(result.diagnostics).toEqual([
      "DocumentIndex: 0",
      "Expected to equal:",
      "  Bye",
      "Actual:",
      "  Thank you for installing",
    ]);
  });

  it("stringifies non-string content in lenient mode", () => {
    const result = validateEqualRaw({ type: "equalRaw", value: "42" }, context([manifest({ raw: 42 })]));
    expect(result.passed).toBe(true);
  });

  it("rejects non-string content in strict mode", () => {
    const result = validateEqualRaw(
      { type: "equalRaw", value: "42" },
      context([manifest({ raw: 42 })], { strict: true })
    );
    expect(result).toEqual({
      passed: false,
      diagnostics: ["DocumentIndex: 0", "Error:", "  expected raw to be a string, got number"],
    });
  });
});
