import type { SpecOf } from "../types/test.js";
import type { ValidateContext, ValidationResult } from "./types.js";
import { fail, failInfo, pass, validateManifests } from "./common.js";

function validateField(
  field: "kind" | "apiVersion",
  expected: string,
  context: ValidateContext
): ValidationResult {
  return validateManifests(context, (manifest) => {
    const actual = manifest.tree[field];
    if ((actual === expected) !== context.negative) {
      return pass();
    }
    return fail(
      failInfo({
        negative: context.negative,
        documentIndex: manifest.index,
        expectation: ` to be ${field}`,
        expected,
        actual: actual ?? null,
      })
    );
  });
}

export function validateIsKind(
  spec: SpecOf<"isKind">,
  context: ValidateContext
): ValidationResult {
  return validateField("kind", spec.of, context);
}

export function validateIsAPIVersion(
  spec: SpecOf<"isAPIVersion">,
  context: ValidateContext
): ValidationResult {
  return validateField("apiVersion", spec.of, context);
}

/**
 * Count of documents the assertion sees
 */
export function validateHasDocuments(
  spec: SpecOf<"hasDocuments">,
  context: ValidateContext
): ValidationResult {
  const actual = context.manifests.length;
  if ((actual === spec.count) !== context.negative) {
    return pass();
  }
  return fail(
    failInfo({
      negative: context.negative,
      expectation: " documents count to be",
      expected: spec.count,
      actual,
    })
  );
}
