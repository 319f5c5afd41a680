import { z } from "zod";

export type AssertionSpec =
  | { type: "equal"; path: string; value: unknown }
  | { type: "equalRaw"; value: string }
  | { type: "matchRegex"; path: string; pattern: string }
  | { type: "matchRegexRaw"; pattern: string }
  | { type: "contains"; path: string; content: unknown; count?: number; any: boolean }
  | { type: "isSubset"; path: string; content: Record<string, unknown> }
  | { type: "isNull"; path: string }
  | { type: "isEmpty"; path: string }
  | { type: "exists"; path: string }
  | { type: "lengthEqual"; path: string; count: number }
  | { type: "isKind"; of: string }
  | { type: "isAPIVersion"; of: string }
  | { type: "hasDocuments"; count: number }
  | { type: "containsDocument"; kind: string; apiVersion: string; name?: string; namespace?: string }
  | { type: "failedTemplate"; errorMessage?: string; errorPattern?: string }
  | { type: "matchSnapshot"; path?: string }
  | { type: "matchSnapshotRaw" };

export type AssertionType = AssertionSpec["type"];
export type SpecOf<T extends AssertionType> = Extract<AssertionSpec, { type: T }>;

/**
 * One declared assertion, normalized from its YAML form
 */
export interface Assertion {
  /** Declared key, e.g. "notEqual" */
  name: string;
  /** Declared `not` combined with the negation a key like "notEqual" carries */
  negative: boolean;
  documentIndex?: number;
  template?: string;
  spec: AssertionSpec;
}

type ObjectSchema = <T extends z.ZodRawShape>(shape: T) => z.ZodObject<T, z.UnknownKeysParam>;

function createSchemas(strict: boolean) {
  // strict rejects unknown keys, lenient drops them
  const object: ObjectSchema = (shape) =>
    strict ? z.object(shape).strict() : z.object(shape);

  const PathSchema = object({ path: z.string() });
  const EqualSchema = object({ path: z.string(), value: z.unknown() });
  const EqualRawSchema = object({ value: z.string() });
  const MatchRegexSchema = object({ path: z.string(), pattern: z.string() });
  const MatchRegexRawSchema = object({ pattern: z.string() });
  const ContainsSchema = object({
    path: z.string(),
    content: z.unknown(),
    count: z.number().int().nonnegative().optional(),
    any: z.boolean().optional(),
  });
  const IsSubsetSchema = object({ path: z.string(), content: z.record(z.unknown()) });
  const LengthEqualSchema = object({ path: z.string(), count: z.number().int().nonnegative() });
  const OfSchema = object({ of: z.string() });
  const CountSchema = object({ count: z.number().int().nonnegative() });
  const ContainsDocumentSchema = object({
    kind: z.string(),
    apiVersion: z.string(),
    name: z.string().optional(),
    namespace: z.string().optional(),
  });
  // `failedTemplate:` with no value parses as null
  const FailedTemplateSchema = object({
    errorMessage: z.string().optional(),
    errorPattern: z.string().optional(),
  }).nullable();
  const MatchSnapshotSchema = object({ path: z.string().optional() }).nullable();
  const MatchSnapshotRawSchema = object({}).nullable();

  const AssertionDeclarationSchema = object({
    not: z.boolean().optional(),
    documentIndex: z.number().int().nonnegative().optional(),
    template: z.string().optional(),

    equal: EqualSchema.optional(),
    notEqual: EqualSchema.optional(),
    equalRaw: EqualRawSchema.optional(),
    notEqualRaw: EqualRawSchema.optional(),
    matchRegex: MatchRegexSchema.optional(),
    notMatchRegex: MatchRegexSchema.optional(),
    matchRegexRaw: MatchRegexRawSchema.optional(),
    notMatchRegexRaw: MatchRegexRawSchema.optional(),
    contains: ContainsSchema.optional(),
    notContains: ContainsSchema.optional(),
    isSubset: IsSubsetSchema.optional(),
    isNotSubset: IsSubsetSchema.optional(),
    isNull: PathSchema.optional(),
    isNotNull: PathSchema.optional(),
    isEmpty: PathSchema.optional(),
    isNotEmpty: PathSchema.optional(),
    exists: PathSchema.optional(),
    notExists: PathSchema.optional(),
    lengthEqual: LengthEqualSchema.optional(),
    isKind: OfSchema.optional(),
    isAPIVersion: OfSchema.optional(),
    hasDocuments: CountSchema.optional(),
    containsDocument: ContainsDocumentSchema.optional(),
    failedTemplate: FailedTemplateSchema.optional(),
    notFailedTemplate: FailedTemplateSchema.optional(),
    matchSnapshot: MatchSnapshotSchema.optional(),
    matchSnapshotRaw: MatchSnapshotRawSchema.optional(),
  });

  type AssertionDeclaration = z.infer<typeof AssertionDeclarationSchema>;
  type Variant = { name: string; negate: boolean; spec: AssertionSpec };

  function variantsOf(decl: AssertionDeclaration): Variant[] {
    const found: Variant[] = [];
    const add = (name: string, negate: boolean, spec: AssertionSpec) =>
      found.push({ name, negate, spec });

    if (decl.equal) add("equal", false, { type: "equal", path: decl.equal.path, value: decl.equal.value ?? null });
    if (decl.notEqual) add("notEqual", true, { type: "equal", path: decl.notEqual.path, value: decl.notEqual.value ?? null });
    if (decl.equalRaw) add("equalRaw", false, { type: "equalRaw", value: decl.equalRaw.value });
    if (decl.notEqualRaw) add("notEqualRaw", true, { type: "equalRaw", value: decl.notEqualRaw.value });
    if (decl.matchRegex) add("matchRegex", false, { type: "matchRegex", ...decl.matchRegex });
    if (decl.notMatchRegex) add("notMatchRegex", true, { type: "matchRegex", ...decl.notMatchRegex });
    if (decl.matchRegexRaw) add("matchRegexRaw", false, { type: "matchRegexRaw", ...decl.matchRegexRaw });
    if (decl.notMatchRegexRaw) add("notMatchRegexRaw", true, { type: "matchRegexRaw", ...decl.notMatchRegexRaw });
    if (decl.contains) {
      const { path, content, count, any } = decl.contains;
      add("contains", false, { type: "contains", path, content: content ?? null, count, any: any ?? false });
    }
    if (decl.notContains) {
      const { path, content, count, any } = decl.notContains;
      add("notContains", true, { type: "contains", path, content: content ?? null, count, any: any ?? false });
    }
    if (decl.isSubset) add("isSubset", false, { type: "isSubset", ...decl.isSubset });
    if (decl.isNotSubset) add("isNotSubset", true, { type: "isSubset", ...decl.isNotSubset });
    if (decl.isNull) add("isNull", false, { type: "isNull", ...decl.isNull });
    if (decl.isNotNull) add("isNotNull", true, { type: "isNull", ...decl.isNotNull });
    if (decl.isEmpty) add("isEmpty", false, { type: "isEmpty", ...decl.isEmpty });
    if (decl.isNotEmpty) add("isNotEmpty", true, { type: "isEmpty", ...decl.isNotEmpty });
    if (decl.exists) add("exists", false, { type: "exists", ...decl.exists });
    if (decl.notExists) add("notExists", true, { type: "exists", ...decl.notExists });
    if (decl.lengthEqual) add("lengthEqual", false, { type: "lengthEqual", ...decl.lengthEqual });
    if (decl.isKind) add("isKind", false, { type: "isKind", ...decl.isKind });
    if (decl.isAPIVersion) add("isAPIVersion", false, { type: "isAPIVersion", ...decl.isAPIVersion });
    if (decl.hasDocuments) add("hasDocuments", false, { type: "hasDocuments", ...decl.hasDocuments });
    if (decl.containsDocument) add("containsDocument", false, { type: "containsDocument", ...decl.containsDocument });
    if (decl.failedTemplate !== undefined) add("failedTemplate", false, { type: "failedTemplate", ...decl.failedTemplate });
    if (decl.notFailedTemplate !== undefined) add("notFailedTemplate", true, { type: "failedTemplate", ...decl.notFailedTemplate });
    if (decl.matchSnapshot !== undefined) add("matchSnapshot", false, { type: "matchSnapshot", ...decl.matchSnapshot });
    if (decl.matchSnapshotRaw !== undefined) add("matchSnapshotRaw", false, { type: "matchSnapshotRaw" });

    return found;
  }

  const AssertionSchema = AssertionDeclarationSchema.transform(
    (decl, ctx): Assertion => {
      const variants = variantsOf(decl);
      if (variants.length !== 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message:
            variants.length === 0
              ? "assertion must declare one validator"
              : `assertion declares several validators: ${variants.map((v) => v.name).join(", ")}`,
        });
        return z.NEVER;
      }

      const [variant] = variants;
      return {
        name: variant.name,
        negative: (decl.not ?? false) !== variant.negate,
        documentIndex: decl.documentIndex,
        template: decl.template,
        spec: variant.spec,
      };
    }
  );

  const ReleaseSchema = object({
    name: z.string().optional(),
    namespace: z.string().optional(),
  });

  const RenderSettings = {
    values: z.array(z.string()).optional(),
    set: z.record(z.unknown()).optional(),
    release: ReleaseSchema.optional(),
  };

  const TestJobSchema = object({
    it: z.string(),
    template: z.string().optional(),
    templates: z.array(z.string()).optional(),
    documentIndex: z.number().int().nonnegative().optional(),
    ...RenderSettings,
    asserts: z.array(AssertionSchema).min(1),
  });

  const TestSuiteSchema = object({
    suite: z.string(),
    templates: z.array(z.string()).optional(),
    ...RenderSettings,
    tests: z.array(TestJobSchema).min(1),
  });

  return { TestSuiteSchema, TestJobSchema, ReleaseSchema };
}

const lenientSchemas = createSchemas(false);
const strictSchemas = createSchemas(true);

export const TestSuiteSchema = lenientSchemas.TestSuiteSchema;
export const StrictTestSuiteSchema = strictSchemas.TestSuiteSchema;

export type TestSuite = z.infer<typeof TestSuiteSchema>;
export type TestJob = z.infer<typeof lenientSchemas.TestJobSchema>;
export type Release = z.infer<typeof lenientSchemas.ReleaseSchema>;
