import deepEqual from "fast-deep-equal";
import type { SpecOf } from "../types/test.js";
import type { ValidateContext, ValidationResult } from "./types.js";
import { errorInfo, fail, failInfo, pass, validatePath } from "./common.js";
import { isRecord, isSubsetOf, typeName } from "./utils.js";

/**
 * Array at path holds the content. With `any`, an element only has to
 * contain the content; with `count`, exactly that many elements must match.
 */
export function validateContains(
  spec: SpecOf<"contains">,
  context: ValidateContext
): ValidationResult {
  return validatePath(context, spec.path, (actual, manifest, valuesIndex) => {
    if (!Array.isArray(actual)) {
      return fail(
        errorInfo(`expected ${spec.path} to be an array, got ${typeName(actual)}`, manifest.index)
      );
    }

    const found = actual.filter((element) =>
      spec.any ? isSubsetOf(element, spec.content) : deepEqual(element, spec.content)
    ).length;
    const matched = spec.count !== undefined ? found === spec.count : found > 0;
    if (matched !== context.negative) {
      return pass();
    }

    return fail(
      failInfo({
        negative: context.negative,
        documentIndex: manifest.index,
        valuesIndex,
        path: spec.path,
        expectation: spec.count !== undefined ? ` to contain ${spec.count} time(s)` : " to contain",
        expected: spec.content,
        actual,
      })
    );
  });
}

/**
 * Mapping at path contains the content, recursively
 */
export function validateIsSubset(
  spec: SpecOf<"isSubset">,
  context: ValidateContext
): ValidationResult {
  return validatePath(context, spec.path, (actual, manifest, valuesIndex) => {
    if (!isRecord(actual)) {
      return fail(
        errorInfo(`expected ${spec.path} to be a mapping, got ${typeName(actual)}`, manifest.index)
      );
    }
    if (isSubsetOf(actual, spec.content) !== context.negative) {
      return pass();
    }
    return fail(
      failInfo({
        negative: context.negative,
        documentIndex: manifest.index,
        valuesIndex,
        path: spec.path,
        expectation: " to contain",
        expected: spec.content,
        actual,
      })
    );
  });
}

/**
 * Some document in the collection has the kind, apiVersion and, where
 * given, metadata name and namespace
 */
export function validateContainsDocument(
  spec: SpecOf<"containsDocument">,
  context: ValidateContext
): ValidationResult {
  const wanted: Record<string, unknown> = { kind: spec.kind, apiVersion: spec.apiVersion };
  const metadata: Record<string, unknown> = {};
  if (spec.name !== undefined) metadata.name = spec.name;
  if (spec.namespace !== undefined) metadata.namespace = spec.namespace;
  if (Object.keys(metadata).length > 0) wanted.metadata = metadata;

  const match = context.manifests.find((manifest) => isSubsetOf(manifest.tree, wanted));
  if ((match !== undefined) !== context.negative) {
    return pass();
  }

  return fail(
    failInfo({
      negative: context.negative,
      documentIndex: match?.index,
      expectation: " to contain document",
      expected: wanted,
    })
  );
}
