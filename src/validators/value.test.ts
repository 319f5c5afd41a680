import { describe, it, expect } from "vitest";
import type { Manifest } from "../types/data.js";
import type { ValidateContext } from "./types.js";
import { validateExists, validateIsEmpty, validateIsNull, validateLengthEqual } from "./value.js";

function context(tree: Record<string, unknown>, overrides: Partial<ValidateContext> = {}): ValidateContext {
  const manifest: Manifest = { index: 0, source: "templates/deployment.yaml", tree };
  return { manifests: [manifest], negative: false, failFast: false, strict: false, ...overrides };
}

const deployment = {
  metadata: { name: "web", labels: { app: "web", tier: "frontend" } },
  spec: { replicas: 1, selector: null, ports: [80, 443] },
};

describe("validateIsNull", () => {
  it("passes on null and absent values", () => {
    expect(validateIsNull({ type: "isNull", path: "spec.selector" }, context(deployment)).passed).toBe(true);
    expect(validateIsNull({ type: "isNull", path: "spec.absent" }, context(deployment)).passed).toBe(true);
  });

  it("reports a set value", () => {
    const result = validateIsNull({ type: "isNull", path: "spec.replicas" }, context(deployment));
    expect(result.diagnostics).toEqual([
      "DocumentIndex: 0",
      "Path: spec.replicas",
      "Expected to be null:",
      "Actual:",
      "  1",
    ]);
  });

  it("fails a negated assertion on null", () => {
    const result = validateIsNull(
      { type: "isNull", path: "spec.selector" },
      context(deployment, { negative: true })
    );
    expect(result.diagnostics).toEqual([
      "DocumentIndex: 0",
      "Path: spec.selector",
      "Expected NOT to be null:",
    ]);
  });
});

describe("validateIsEmpty", () => {
  const values = { a: "", b: [], c: {}, d: 0, e: false, f: "x", g: [1] };

  it("treats zero values as empty", () => {
    for (const path of ["a", "b", "c", "d", "e", "missing"]) {
      expect(validateIsEmpty({ type: "isEmpty", path }, context(values)).passed).toBe(true);
    }
  });

  it("reports a value that is not empty", () => {
    const result = validateIsEmpty({ type: "isEmpty", path: "f" }, context(values));
    expect(result.diagnostics).toEqual([
      "DocumentIndex: 0",
      "Path: f",
      "Expected to be empty:",
      "Actual:",
      "  x",
    ]);
  });

  it("passes a negated assertion on a filled array", () => {
    const result = validateIsEmpty({ type: "isEmpty", path: "g" }, context(values, { negative: true }));
    expect(result.passed).toBe(true);
  });
});

describe("validateExists", () => {
  it("passes on a present path", () => {
    expect(validateExists({ type: "exists", path: "spec.replicas" }, context(deployment)).passed).toBe(true);
  });

  it("reports a missing path", () => {
    const result = validateExists({ type: "exists", path: "spec.missing" }, context(deployment));
    expect(result.diagnostics).toEqual(["DocumentIndex: 0", "Path: spec.missing", "Expected to exist:"]);
  });

  it("passes a negated assertion on a missing path", () => {
    const result = validateExists(
      { type: "exists", path: "spec.missing" },
      context(deployment, { negative: true })
    );
    expect(result.passed).toBe(true);
  });
});

describe("validateLengthEqual", () => {
  it("measures arrays and mappings", () => {
    expect(
      validateLengthEqual({ type: "lengthEqual", path: "spec.ports", count: 2 }, context(deployment)).passed
    ).toBe(true);
    expect(
      validateLengthEqual({ type: "lengthEqual", path: "metadata.labels", count: 2 }, context(deployment)).passed
    ).toBe(true);
  });

  it("reports a different length", () => {
    const result = validateLengthEqual(
      { type: "lengthEqual", path: "spec.ports", count: 3 },
      context(deployment)
    );
    expect(result.diagnostics).toEqual([
      "DocumentIndex: 0",
      "Path: spec.ports",
      "Expected to have length:",
      "  3",
      "Actual:",
      "  2",
    ]);
  });

  it("reports a scalar", () => {
    const result = validateLengthEqual(
      { type: "lengthEqual", path: "metadata.name", count: 1 },
      context(deployment)
    );
    expect(result.diagnostics).toEqual([
      "DocumentIndex: 0",
      "Error:",
      "  expected metadata.name to be an array or mapping, got string",
    ]);
  });
});
