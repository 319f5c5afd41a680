import yaml from "js-yaml";
import { RAW_KEY, type Manifest } from "../types/data.js";
import { isRecord } from "../validators/utils.js";

const DOCUMENT_SEPARATOR = /^---[ \t]*$/m;
const SOURCE_COMMENT = /^# Source: (.+)$/m;

/**
 * Strip the chart name: mychart/templates/a.yaml -> templates/a.yaml
 */
export function normalizeSource(source: string): string {
  const slash = source.indexOf("/");
  return slash === -1 ? source : source.slice(slash + 1);
}

/**
 * Split multi-document render output into manifests. Documents are
 * numbered per source template; non-mapping documents keep their text
 * under the raw key.
 */
export function parseRenderedOutput(output: string): Manifest[] {
  const manifests: Manifest[] = [];
  const counters = new Map<string, number>();

  for (const chunk of output.split(DOCUMENT_SEPARATOR)) {
    if (chunk.trim() === "") continue;

    const loaded: unknown = yaml.load(chunk);
    if (loaded === undefined || loaded === null) continue;

    const source = normalizeSource(chunk.match(SOURCE_COMMENT)?.[1]?.trim() ?? "");
    const index = counters.get(source) ?? 0;
    counters.set(source, index + 1);

    manifests.push({
      index,
      source,
      tree: isRecord(loaded)
        ? loaded
        : { [RAW_KEY]: typeof loaded === "string" ? loaded : JSON.stringify(loaded) },
    });
  }

  return manifests;
}
