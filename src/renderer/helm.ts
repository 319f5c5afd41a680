import { execa } from "execa";
import type { RenderResult } from "../types/data.js";
import type { RenderRequest, Renderer } from "./types.js";
import { parseRenderedOutput } from "./parse.js";

const DEFAULT_TIMEOUT_MS = 60000;
const ERROR_PREFIX = /^Error: /;

export interface HelmRendererOptions {
  helmBinary?: string;
  timeoutMs?: number;
  onDebug?: (message: string) => void;
}

/**
 * Arguments for `helm template`
 */
export function buildTemplateArgs(request: RenderRequest): string[] {
  const args = ["template", request.releaseName, request.chartPath, "--namespace", request.namespace];
  for (const file of request.valuesFiles) {
    args.push("--values", file);
  }
  for (const [key, value] of Object.entries(request.set)) {
    args.push("--set-json", `${key}=${JSON.stringify(value)}`);
  }
  for (const template of request.templates) {
    const path = template.startsWith("templates/") || template.startsWith("charts/")
      ? template
      : `templates/${template}`;
    args.push("--show-only", path);
  }
  return args;
}

/**
 * Renders through the helm binary
 */
export class HelmRenderer implements Renderer {
  private helmBinary: string;
  private timeoutMs: number;
  private debug: (message: string) => void;

  constructor(options: HelmRendererOptions = {}) {
    this.helmBinary = options.helmBinary ?? "helm";
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.debug = options.onDebug ?? (() => {});
  }

  async render(request: RenderRequest): Promise<RenderResult> {
    const args = buildTemplateArgs(request);
    this.debug(`[Render] Running: ${this.helmBinary} ${args.join(" ")}`);

    const startTs = Date.now();
    const result = await execa(this.helmBinary, args, {
      timeout: this.timeoutMs,
      reject: false,
    });
    this.debug(`[Render] Exit code: ${result.exitCode ?? "none"} (${Date.now() - startTs}ms)`);

    if (result.timedOut) {
      throw new Error(`${this.helmBinary} timed out after ${this.timeoutMs}ms`);
    }
    if (result.exitCode === undefined) {
      const reason = result instanceof Error ? result.message : "no exit code";
      throw new Error(`Failed to run ${this.helmBinary}: ${reason}`);
    }

    const stdoutRaw = result.stdout;
    const stdout = typeof stdoutRaw === "string" ? stdoutRaw : "";

    if (result.exitCode !== 0) {
      const stderrRaw = result.stderr;
      const stderr = typeof stderrRaw === "string" ? stderrRaw.trim() : "";
      const message = (stderr || `${this.helmBinary} exited with code ${result.exitCode}`)
        .replace(ERROR_PREFIX, "");
      this.debug(`[Render] Error: ${message}`);
      return { ok: false, error: new Error(message) };
    }

    try {
      return { ok: true, manifests: parseRenderedOutput(stdout) };
    } catch (err) {
      return {
        ok: false,
        error: new Error(`Unreadable render output: ${err instanceof Error ? err.message : String(err)}`),
      };
    }
  }
}
