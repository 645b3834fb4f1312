/**
 * GFF utilities: content sniffing and record-stream filtering
 *
 * @module gff/utils
 */

import { GffFeature } from "./feature";
import type { GffRecord } from "./types";

/**
 * Detect if string contains tab-delimited GFF/GTF annotation lines
 *
 * Looks at the first three non-comment lines: each needs nine columns,
 * integer coordinates with `start <= end`, and a strand of `+`, `-` or `.`.
 *
 * @example
 * ```typescript
 * if (detectGffFormat(fileContent)) {
 *   const records = new GffReader().parseString(fileContent);
 * }
 * ```
 *
 * @public
 */
function detectGffFormat(data: string): boolean {
  const lines = data
    .split(/\r?\n/)
    .filter((line) => line.trim() !== "" && !line.startsWith("#"))
    .slice(0, 3);

  if (lines.length === 0) return false;

  return lines.every((line) => {
    const fields = line.split("\t");
    if (fields.length < 9) return false;

    const [, , , startStr = "", endStr = "", , strand = ""] = fields;
    if (!/^\d+$/.test(startStr) || !/^\d+$/.test(endStr)) return false;
    if (Number.parseInt(endStr, 10) < Number.parseInt(startStr, 10)) return false;

    return strand === "+" || strand === "-" || strand === ".";
  });
}

/**
 * Keep only features of the given types, matched on the seed's type
 *
 * @example
 * ```typescript
 * for await (const mRNA of filterFeaturesByType(reader.parseFile(path), ["mRNA"])) {
 *   console.log(mRNA.name());
 * }
 * ```
 *
 * @public
 */
function filterFeaturesByType(
  records: AsyncIterable<GffRecord>,
  featureTypes: readonly string[]
): AsyncIterable<GffFeature> {
  const typeSet = new Set(featureTypes);

  return {
    async *[Symbol.asyncIterator]() {
      for await (const record of records) {
        if (record instanceof GffFeature && typeSet.has(record.featureType)) {
          yield record;
        }
      }
    },
  };
}

// =============================================================================
// EXPORTS
// =============================================================================

export { detectGffFormat, filterFeaturesByType };
