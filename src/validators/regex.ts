import { RAW_KEY } from "../types/data.js";
import type { Manifest } from "../types/data.js";
import type { SpecOf } from "../types/test.js";
import type { ValidateContext, ValidationResult } from "./types.js";
import { errorInfo, fail, failInfo, pass, validateManifests, validatePath } from "./common.js";
import { errorMessage, extractString, parsePattern } from "./utils.js";

function matchValue(
  pattern: RegExp,
  source: string,
  value: unknown,
  what: string,
  manifest: Manifest,
  context: ValidateContext,
  location: { path?: string; valuesIndex?: number }
): ValidationResult {
  const extracted = extractString(value, context.strict, what);
  if (!extracted.ok) {
    return fail(errorInfo(extracted.error, manifest.index));
  }
  if (pattern.test(extracted.value) !== context.negative) {
    return pass();
  }
  return fail(
    failInfo({
      negative: context.negative,
      documentIndex: manifest.index,
      ...location,
      expectation: " to match",
      expected: source,
      actual: extracted.value,
    })
  );
}

function compile(source: string): RegExp | ValidationResult {
  try {
    return parsePattern(source);
  } catch (err) {
    return fail(errorInfo(errorMessage(err)));
  }
}

/**
 * Value at path matches a regular expression (searched, not anchored)
 */
export function validateMatchRegex(
  spec: SpecOf<"matchRegex">,
  context: ValidateContext
): ValidationResult {
  const pattern = compile(spec.pattern);
  if (!(pattern instanceof RegExp)) {
    return pattern;
  }
  return validatePath(context, spec.path, (value, manifest, valuesIndex) =>
    matchValue(pattern, spec.pattern, value, spec.path, manifest, context, {
      path: spec.path,
      valuesIndex,
    })
  );
}

export function validateMatchRegexRaw(
  spec: SpecOf<"matchRegexRaw">,
  context: ValidateContext
): ValidationResult {
  const pattern = compile(spec.pattern);
  if (!(pattern instanceof RegExp)) {
    return pattern;
  }
  return validateManifests(context, (manifest) =>
    matchValue(pattern, spec.pattern, manifest.tree[RAW_KEY], RAW_KEY, manifest, context, {})
  );
}
