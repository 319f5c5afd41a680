import deepEqual from "fast-deep-equal";
import { RAW_KEY } from "../types/data.js";
import type { SpecOf } from "../types/test.js";
import type { ValidateContext, ValidationResult } from "./types.js";
import { errorInfo, fail, failInfo, pass, trace, validateManifests, validatePath } from "./common.js";
import { extractString } from "./utils.js";

/**
 * Value at path equals the expected value, compared structurally
 */
export function validateEqual(
  spec: SpecOf<"equal">,
  context: ValidateContext
): ValidationResult {
  return validatePath(context, spec.path, (actual, manifest, valuesIndex) => {
    if (deepEqual(actual, spec.value) !== context.negative) {
      return pass();
    }
    trace(context, "equal", spec.value, actual);
    return fail(
      failInfo({
        negative: context.negative,
        documentIndex: manifest.index,
        valuesIndex,
        path: spec.path,
        expectation: " to equal",
        expected: spec.value,
        actual,
      })
    );
  });
}

/**
 * Raw text of a non-mapping document equals the expected text
 */
export function validateEqualRaw(
  spec: SpecOf<"equalRaw">,
  context: ValidateContext
): ValidationResult {
  return validateManifests(context, (manifest) => {
    const extracted = extractString(manifest.tree[RAW_KEY], context.strict, RAW_KEY);
    if (!extracted.ok) {
      return fail(errorInfo(extracted.error, manifest.index));
    }
    if ((extracted.value === spec.value) !== context.negative) {
      return pass();
    }
    trace(context, "equalRaw", spec.value, extracted.value);
    return fail(
      failInfo({
        negative: context.negative,
        documentIndex: manifest.index,
        expectation: " to equal",
        expected: spec.value,
        actual: extracted.value,
      })
    );
  });
}
