import type { Assertion, AssertionSpec } from "../types/test.js";
import type { ValidateContext, ValidationResult } from "./types.js";
import { errorInfo, fail } from "./common.js";
import { validateFailedTemplate } from "./failed-template.js";
import { validateEqual, validateEqualRaw } from "./equal.js";
import { validateMatchRegex, validateMatchRegexRaw } from "./regex.js";
import { validateContains, validateContainsDocument, validateIsSubset } from "./contains.js";
import { validateExists, validateIsEmpty, validateIsNull, validateLengthEqual } from "./value.js";
import { validateHasDocuments, validateIsAPIVersion, validateIsKind } from "./kind.js";
import { validateMatchSnapshot, validateMatchSnapshotRaw } from "./snapshot.js";

function dispatch(spec: AssertionSpec, context: ValidateContext): ValidationResult {
  switch (spec.type) {
    case "equal":
      return validateEqual(spec, context);
    case "equalRaw":
      return validateEqualRaw(spec, context);
    case "matchRegex":
      return validateMatchRegex(spec, context);
    case "matchRegexRaw":
      return validateMatchRegexRaw(spec, context);
    case "contains":
      return validateContains(spec, context);
    case "isSubset":
      return validateIsSubset(spec, context);
    case "isNull":
      return validateIsNull(spec, context);
    case "isEmpty":
      return validateIsEmpty(spec, context);
    case "exists":
      return validateExists(spec, context);
    case "lengthEqual":
      return validateLengthEqual(spec, context);
    case "isKind":
      return validateIsKind(spec, context);
    case "isAPIVersion":
      return validateIsAPIVersion(spec, context);
    case "hasDocuments":
      return validateHasDocuments(spec, context);
    case "containsDocument":
      return validateContainsDocument(spec, context);
    case "failedTemplate":
      return validateFailedTemplate(spec, context);
    case "matchSnapshot":
      return validateMatchSnapshot(spec, context);
    case "matchSnapshotRaw":
      return validateMatchSnapshotRaw(spec, context);
    default: {
      // Exhaustive check - TypeScript will error if we miss a case
      const _exhaustive: never = spec;
      throw new Error(`Unknown assertion type: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Evaluate one assertion. A render error fails every assertion except
 * the ones that check for it.
 */
export function validateAssertion(
  assertion: Assertion,
  context: ValidateContext
): ValidationResult {
  if (context.renderError && assertion.spec.type !== "failedTemplate") {
    return fail(errorInfo(context.renderError.message));
  }
  return dispatch(assertion.spec, context);
}
