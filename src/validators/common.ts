import yaml from "js-yaml";
import { JSONPath } from "jsonpath-plus";
import type { Manifest, ManifestTree } from "../types/data.js";
import type { ValidateContext, ValidationResult } from "./types.js";
import { errorMessage } from "./utils.js";

export const NO_MANIFEST = "no manifest found";

export interface FailInfo {
  negative: boolean;
  /** Appended to "Expected", e.g. " to equal" */
  expectation: string;
  documentIndex?: number;
  valuesIndex?: number;
  path?: string;
  expected?: unknown;
  /** Left out of negated failures */
  actual?: unknown;
}

export function renderValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined) return "null";
  return yaml.dump(value, { noRefs: true }).trimEnd();
}

function indent(text: string): string[] {
  return text.split("\n").map((line) => `  ${line}`);
}

function locationLines(documentIndex?: number, valuesIndex?: number): string[] {
  const lines: string[] = [];
  if (documentIndex !== undefined && documentIndex >= 0) {
    lines.push(`DocumentIndex: ${documentIndex}`);
  }
  if (valuesIndex !== undefined && valuesIndex >= 0) {
    lines.push(`ValuesIndex: ${valuesIndex}`);
  }
  return lines;
}

/**
 * Diagnostic lines for a failed match
 */
export function failInfo(info: FailInfo): string[] {
  const lines = locationLines(info.documentIndex, info.valuesIndex);
  if (info.path !== undefined) {
    lines.push(`Path: ${info.path}`);
  }
  lines.push(`Expected${info.negative ? " NOT" : ""}${info.expectation}:`);
  if ("expected" in info) {
    lines.push(...indent(renderValue(info.expected)));
  }
  if (!info.negative && "actual" in info) {
    lines.push("Actual:", ...indent(renderValue(info.actual)));
  }
  return lines;
}

/**
 * Diagnostic lines for a configuration or type error
 */
export function errorInfo(message: string, documentIndex?: number): string[] {
  return [...locationLines(documentIndex), "Error:", ...indent(message)];
}

export function pass(): ValidationResult {
  return { passed: true, diagnostics: [] };
}

export function fail(diagnostics: string[]): ValidationResult {
  return { passed: false, diagnostics };
}

/**
 * Once a manifest has failed, later successes never restore success
 */
export function determineSuccess(previous: boolean, current: boolean): boolean {
  return previous && current;
}

export function trace(
  context: ValidateContext,
  validator: string,
  expected: unknown,
  actual: unknown
): void {
  if (!context.onDebug) return;
  context.onDebug(`[${validator}] expected content: ${renderValue(expected)}`);
  context.onDebug(`[${validator}] actual content: ${renderValue(actual)}`);
}

/**
 * Check every manifest in index order, folding the results
 */
export function validateManifests(
  context: ValidateContext,
  check: (manifest: Manifest) => ValidationResult
): ValidationResult {
  if (context.manifests.length === 0) {
    return context.negative ? pass() : fail(errorInfo(NO_MANIFEST));
  }

  let passed = true;
  const diagnostics: string[] = [];
  for (const manifest of context.manifests) {
    const result = check(manifest);
    diagnostics.push(...result.diagnostics);
    passed = determineSuccess(passed, result.passed);
    if (!passed && context.failFast) {
      break;
    }
  }
  return { passed, diagnostics };
}

export type PathLookup =
  | { ok: true; values: unknown[] }
  | { ok: false; error: string };

function toJsonPath(path: string): string {
  if (path.startsWith("$")) return path;
  return path.startsWith("[") ? `$${path}` : `$.${path}`;
}

/**
 * Resolve a path (spec.replicas, spec.containers[0].image, $..image)
 * against a document. An empty path selects the whole document.
 */
export function getValues(tree: ManifestTree, path: string): PathLookup {
  if (path.trim() === "") {
    return { ok: true, values: [tree] };
  }
  try {
    const result: unknown = JSONPath({ path: toJsonPath(path), json: tree, wrap: true });
    return { ok: true, values: Array.isArray(result) ? result : [] };
  } catch (err) {
    return { ok: false, error: `invalid path ${path}: ${errorMessage(err)}` };
  }
}

export type ValueCheck = (
  value: unknown,
  manifest: Manifest,
  valuesIndex: number | undefined
) => ValidationResult;

/**
 * Check every value a path yields in every manifest.
 * `missing: "absent"` evaluates a missing path as an undefined value,
 * `missing: "fail"` reports it unless the context is negated.
 */
export function validatePath(
  context: ValidateContext,
  path: string,
  check: ValueCheck,
  missing: "fail" | "absent" = "fail"
): ValidationResult {
  return validateManifests(context, (manifest) => {
    const lookup = getValues(manifest.tree, path);
    if (!lookup.ok) {
      return fail(errorInfo(lookup.error, manifest.index));
    }

    if (lookup.values.length === 0) {
      if (missing === "absent") {
        return check(undefined, manifest, undefined);
      }
      return context.negative ? pass() : fail(errorInfo(`unknown path ${path}`, manifest.index));
    }

    const multiple = lookup.values.length > 1;
    let passed = true;
    const diagnostics: string[] = [];
    for (const [i, value] of lookup.values.entries()) {
      const result = check(value, manifest, multiple ? i : undefined);
      diagnostics.push(...result.diagnostics);
      passed = determineSuccess(passed, result.passed);
      if (!passed && context.failFast) {
        break;
      }
    }
    return { passed, diagnostics };
  });
}
