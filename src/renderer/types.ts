import type { RenderResult } from "../types/data.js";

export interface RenderRequest {
  chartPath: string;
  releaseName: string;
  namespace: string;
  /** Template paths relative to the chart's templates/ directory */
  templates: string[];
  valuesFiles: string[];
  set: Record<string, unknown>;
}

/**
 * Turns a chart plus values into rendered documents or a render error.
 * Template errors come back as `{ ok: false }`; a renderer that cannot
 * run at all throws.
 */
export interface Renderer {
  render(request: RenderRequest): Promise<RenderResult>;
}
