import { describe, it, expect } from "vitest";
import type { Manifest, RenderResult } from "../types/data.js";
import { TestSuiteSchema, type TestSuite } from "../types/index.js";
import type { RenderRequest, Renderer } from "../renderer/types.js";
import { SnapshotCache } from "../snapshot/index.js";
import { matchesTemplate, runJob, selectManifests, type JobConfig } from "./job.js";

class FakeRenderer implements Renderer {
  readonly requests: RenderRequest[] = [];

  constructor(private readonly result: RenderResult) {}

  async render(request: RenderRequest): Promise<RenderResult> {
    this.requests.push(request);
    return this.result;
  }
}

const manifests: Manifest[] = [
  { index: 0, source: "templates/deployment.yaml", tree: { kind: "Deployment", spec: { replicas: 3 } } },
  { index: 1, source: "templates/deployment.yaml", tree: { kind: "Deployment", spec: { replicas: 1 } } },
  { index: 0, source: "templates/service.yaml", tree: { kind: "Service" } },
];

const config: JobConfig = { failFast: false, strict: false, updateSnapshot: false };

function suite(job: Record<string, unknown>): TestSuite {
  return TestSuiteSchema.parse({ suite: "web", tests: [{ it: "renders", ...job }] });
}

async function run(s: TestSuite, renderer: Renderer, overrides: Partial<JobConfig> = {}, cache?: SnapshotCache) {
  return runJob({
    suite: s,
    job: s.tests[0],
    suiteFilePath: "/work/web/tests/web_test.yaml",
    chartPath: "/work/web",
    renderer,
    config: { ...config, ...overrides },
    snapshots: cache,
  });
}

describe("matchesTemplate", () => {
  it("matches names under templates/ and full paths", () => {
    expect(matchesTemplate("templates/deployment.yaml", "deployment.yaml")).toBe(true);
    expect(matchesTemplate("templates/deployment.yaml", "templates/deployment.yaml")).toBe(true);
    expect(matchesTemplate("charts/db/templates/deployment.yaml", "deployment.yaml")).toBe(true);
    expect(matchesTemplate("templates/service.yaml", "deployment.yaml")).toBe(false);
    expect(matchesTemplate("templates/my-deployment.yaml", "deployment.yaml")).toBe(false);
  });
});

describe("selectManifests", () => {
  it("filters by template and document index", () => {
    expect(selectManifests(manifests)).toHaveLength(3);
    expect(selectManifests(manifests, "deployment.yaml")).toEqual(manifests.slice(0, 2));
    expect(selectManifests(manifests, "deployment.yaml", 1)).toEqual([manifests[1]]);
    expect(selectManifests(manifests, undefined, 0)).toEqual([manifests[0], manifests[2]]);
  });
});

describe("runJob", () => {
  const asserts = [
    { isKind: { of: "Deployment" } },
    { equal: { path: "spec.replicas", value: 3 } },
    { hasDocuments: { count: 2 } },
  ];

  it("evaluates every assertion without fail-fast", async () => {
    const renderer = new FakeRenderer({ ok: true, manifests });
    const result = await run(suite({ template: "deployment.yaml", asserts }), renderer);

    expect(result.name).toBe("renders");
    expect(result.status).toBe("failed");
    expect(result.assertions.map((a) => a.status)).toEqual(["passed", "failed", "passed"]);
    expect(result.assertions[1].diagnostics).toEqual([
      "DocumentIndex: 1",
      "Path: spec.replicas",
      "Expected to equal:",
      "  3",
      "Actual:",
      "  1",
    ]);
    expect(renderer.requests[0].templates).toEqual(["deployment.yaml"]);
  });

  it("skips the rest after a failure under fail-fast", async () => {
    const renderer = new FakeRenderer({ ok: true, manifests });
    const result = await run(suite({ template: "deployment.yaml", asserts }), renderer, { failFast: true });
    expect(result.assertions.map((a) => a.status)).toEqual(["passed", "failed", "skipped"]);
    expect(result.assertions[2]).toEqual({
      index: 2,
      name: "hasDocuments",
      negative: false,
      status: "skipped",
      diagnostics: [],
    });
  });

  it("selects documents by index", async () => {
    const renderer = new FakeRenderer({ ok: true, manifests });
    const result = await run(
      suite({
        template: "deployment.yaml",
        documentIndex: 0,
        asserts: [
          { equal: { path: "spec.replicas", value: 3 } },
          { equal: { path: "spec.replicas", value: 1 }, documentIndex: 1 },
        ],
      }),
      renderer
    );
    expect(result.status).toBe("passed");
  });

  it("lets an assertion pick its own template", async () => {
    const renderer = new FakeRenderer({ ok: true, manifests });
    const result = await run(
      suite({ asserts: [{ isKind: { of: "Service" }, template: "service.yaml" }] }),
      renderer
    );
    expect(result.status).toBe("passed");
  });

  it("hands render errors to the assertions", async () => {
    const renderer = new FakeRenderer({ ok: false, error: new Error("template: bad indentation") });
    const result = await run(
      suite({
        asserts: [{ failedTemplate: { errorPattern: "bad.*" } }, { isKind: { of: "Deployment" } }],
      }),
      renderer
    );
    expect(result.renderError).toBe("template: bad indentation");
    expect(result.assertions.map((a) => a.status)).toEqual(["passed", "failed"]);
    expect(result.assertions[1].diagnostics).toEqual(["Error:", "  template: bad indentation"]);
  });

  it("numbers snapshots across the job's assertions", async () => {
    const renderer = new FakeRenderer({ ok: true, manifests });
    const cache = new SnapshotCache();
    const result = await run(
      suite({
        template: "service.yaml",
        asserts: [{ matchSnapshot: null }, { matchSnapshot: { path: "kind" } }],
      }),
      renderer,
      { updateSnapshot: true },
      cache
    );
    expect(result.status).toBe("passed");
    expect(cache.toJSON()).toEqual({ web: { renders: { "1": { kind: "Service" }, "2": "Service" } } });
  });
});
