import { RAW_KEY } from "../types/data.js";
import type { Manifest } from "../types/data.js";
import type { SpecOf } from "../types/test.js";
import type { ValidateContext, ValidationResult } from "./types.js";
import { errorInfo, fail, failInfo, getValues, pass, trace, validateManifests } from "./common.js";
import { extractString } from "./utils.js";

export const NO_SNAPSHOT_STORE = "snapshot store is not available";

function compareSnapshot(
  content: unknown,
  manifest: Manifest,
  context: ValidateContext
): ValidationResult {
  if (!context.snapshot) {
    return fail(errorInfo(NO_SNAPSHOT_STORE, manifest.index));
  }

  const comparison = context.snapshot.compare(content, { readonly: context.negative });
  const { key } = comparison;

  switch (comparison.status) {
    case "missing":
      return fail(
        errorInfo(
          `no snapshot recorded for "${key.test}" #${key.ordinal}, run with --update-snapshot to record it`,
          manifest.index
        )
      );
    case "created":
      context.onDebug?.(`[matchSnapshot] created "${key.test}" #${key.ordinal}`);
      return pass();
    case "updated":
      context.onDebug?.(`[matchSnapshot] updated "${key.test}" #${key.ordinal}`);
      return pass();
    case "matched":
    case "mismatched": {
      const matched = comparison.status === "matched";
      if (matched !== context.negative) {
        return pass();
      }
      trace(context, "matchSnapshot", comparison.stored, content);
      return fail(
        failInfo({
          negative: context.negative,
          documentIndex: manifest.index,
          expectation: ` to match snapshot ${key.ordinal}`,
          expected: comparison.stored,
          actual: content,
        })
      );
    }
  }
}

/**
 * Compare each document (or the value at path) with its recorded snapshot
 */
export function validateMatchSnapshot(
  spec: SpecOf<"matchSnapshot">,
  context: ValidateContext
): ValidationResult {
  return validateManifests(context, (manifest) => {
    if (spec.path === undefined) {
      return compareSnapshot(manifest.tree, manifest, context);
    }
    const lookup = getValues(manifest.tree, spec.path);
    if (!lookup.ok) {
      return fail(errorInfo(lookup.error, manifest.index));
    }
    if (lookup.values.length === 0) {
      return context.negative ? pass() : fail(errorInfo(`unknown path ${spec.path}`, manifest.index));
    }
    const content = lookup.values.length === 1 ? lookup.values[0] : lookup.values;
    return compareSnapshot(content, manifest, context);
  });
}

export function validateMatchSnapshotRaw(
  _spec: SpecOf<"matchSnapshotRaw">,
  context: ValidateContext
): ValidationResult {
  return validateManifests(context, (manifest) => {
    const extracted = extractString(manifest.tree[RAW_KEY], context.strict, RAW_KEY);
    if (!extracted.ok) {
      return fail(errorInfo(extracted.error, manifest.index));
    }
    return compareSnapshot(extracted.value, manifest, context);
  });
}
