import type { SpecOf } from "../types/test.js";
import type { ValidateContext, ValidationResult } from "./types.js";
import { errorInfo, fail, failInfo, getValues, pass, validateManifests, validatePath } from "./common.js";
import { isEmptyValue, isRecord, typeName } from "./utils.js";

export function validateIsNull(
  spec: SpecOf<"isNull">,
  context: ValidateContext
): ValidationResult {
  return validatePath(
    context,
    spec.path,
    (actual, manifest, valuesIndex) => {
      if ((actual === null || actual === undefined) !== context.negative) {
        return pass();
      }
      return fail(
        failInfo({
          negative: context.negative,
          documentIndex: manifest.index,
          valuesIndex,
          path: spec.path,
          expectation: " to be null",
          actual,
        })
      );
    },
    "absent"
  );
}

export function validateIsEmpty(
  spec: SpecOf<"isEmpty">,
  context: ValidateContext
): ValidationResult {
  return validatePath(
    context,
    spec.path,
    (actual, manifest, valuesIndex) => {
      if (isEmptyValue(actual) !== context.negative) {
        return pass();
      }
      return fail(
        failInfo({
          negative: context.negative,
          documentIndex: manifest.index,
          valuesIndex,
          path: spec.path,
          expectation: " to be empty",
          actual,
        })
      );
    },
    "absent"
  );
}

export function validateExists(
  spec: SpecOf<"exists">,
  context: ValidateContext
): ValidationResult {
  return validateManifests(context, (manifest) => {
    const lookup = getValues(manifest.tree, spec.path);
    if (!lookup.ok) {
      return fail(errorInfo(lookup.error, manifest.index));
    }
    if ((lookup.values.length > 0) !== context.negative) {
      return pass();
    }
    return fail(
      failInfo({
        negative: context.negative,
        documentIndex: manifest.index,
        path: spec.path,
        expectation: " to exist",
      })
    );
  });
}

/**
 * Array length or mapping size at path
 */
export function validateLengthEqual(
  spec: SpecOf<"lengthEqual">,
  context: ValidateContext
): ValidationResult {
  return validatePath(context, spec.path, (actual, manifest, valuesIndex) => {
    let length: number;
    if (Array.isArray(actual)) {
      length = actual.length;
    } else if (isRecord(actual)) {
      length = Object.keys(actual).length;
    } else {
      return fail(
        errorInfo(`expected ${spec.path} to be an array or mapping, got ${typeName(actual)}`, manifest.index)
      );
    }

    if ((length === spec.count) !== context.negative) {
      return pass();
    }
    return fail(
      failInfo({
        negative: context.negative,
        documentIndex: manifest.index,
        valuesIndex,
        path: spec.path,
        expectation: " to have length",
        expected: spec.count,
        actual: length,
      })
    );
  });
}
