import { RAW_KEY } from "../types/data.js";
import type { SpecOf } from "../types/test.js";
import type { ValidateContext, ValidationResult } from "./types.js";
import { determineSuccess, errorInfo, fail, failInfo, pass, trace } from "./common.js";
import { errorMessage, extractString, parsePattern } from "./utils.js";

type FailedTemplateSpec = SpecOf<"failedTemplate">;

export const BOTH_ATTRIBUTES_SET =
  "single attribute 'errorMessage' or 'errorPattern' supported at the same time";

export const NO_FAILED_DOCUMENT =
  "Expected a failed template, but rendering produced no error and no manifests";

function isSet(value: string | undefined): value is string {
  return value !== undefined && value !== "";
}

function failureInfo(
  spec: FailedTemplateSpec,
  actual: string | undefined,
  documentIndex: number,
  context: ValidateContext
): string[] {
  const expected = isSet(spec.errorPattern) ? spec.errorPattern : spec.errorMessage ?? "";
  trace(context, "failedTemplate", expected, actual);
  return failInfo({
    negative: context.negative,
    documentIndex,
    expectation: isSet(spec.errorPattern) ? " to match" : " to equal",
    expected,
    actual,
  });
}

/**
 * Check one error text; a missing text never matches
 */
function checkError(
  spec: FailedTemplateSpec,
  actual: string | undefined,
  documentIndex: number,
  context: ValidateContext
): ValidationResult {
  let matched: boolean;
  if (isSet(spec.errorPattern)) {
    let pattern: RegExp;
    try {
      pattern = parsePattern(spec.errorPattern);
    } catch (err) {
      return fail(errorInfo(errorMessage(err)));
    }
    matched = actual !== undefined && pattern.test(actual);
  } else if (isSet(spec.errorMessage)) {
    matched = actual !== undefined && actual === spec.errorMessage;
  } else {
    return pass();
  }

  if (matched === context.negative) {
    return fail(failureInfo(spec, actual, documentIndex, context));
  }
  return pass();
}

function validateManifestErrors(
  spec: FailedTemplateSpec,
  context: ValidateContext
): ValidationResult {
  const { manifests } = context;

  if (manifests.length === 0) {
    return context.negative ? pass() : fail([NO_FAILED_DOCUMENT]);
  }

  // Quirk kept on purpose: with no expectation and no negation, populated
  // output is accepted without looking at it.
  if (!isSet(spec.errorMessage) && !isSet(spec.errorPattern) && !context.negative) {
    return pass();
  }

  let passed = true;
  const diagnostics: string[] = [];
  for (const manifest of manifests) {
    const raw = manifest.tree[RAW_KEY];
    let result: ValidationResult;
    if (raw === undefined || raw === null) {
      result = checkError(spec, undefined, manifest.index, context);
    } else {
      const extracted = extractString(raw, context.strict, RAW_KEY);
      result = extracted.ok
        ? checkError(spec, extracted.value, manifest.index, context)
        : fail(errorInfo(extracted.error, manifest.index));
    }

    diagnostics.push(...result.diagnostics);
    passed = determineSuccess(passed, result.passed);
    if (!passed && context.failFast) {
      break;
    }
  }

  return { passed, diagnostics };
}

/**
 * Assert that rendering failed, optionally with a given message or pattern
 */
export function validateFailedTemplate(
  spec: FailedTemplateSpec,
  context: ValidateContext
): ValidationResult {
  if (isSet(spec.errorMessage) && isSet(spec.errorPattern)) {
    return fail(errorInfo(BOTH_ATTRIBUTES_SET));
  }

  if (context.renderError) {
    return checkError(spec, context.renderError.message, -1, context);
  }

  return validateManifestErrors(spec, context);
}
