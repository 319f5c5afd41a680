/**
 * Key under which the text of a non-mapping rendered document is stored
 */
export const RAW_KEY = 'raw';

export type ManifestTree = Readonly<Record<string, unknown>>;

/**
 * One rendered document
 */
export interface Manifest {
  /** Position among the documents rendered from the same source template */
  readonly index: number;
  /** Template path relative to the chart root, e.g. templates/deployment.yaml */
  readonly source: string;
  readonly tree: ManifestTree;
}

export type RenderResult =
  | { ok: true; manifests: Manifest[] }
  | { ok: false; error: Error };
