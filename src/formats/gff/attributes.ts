/**
 * Ninth-column attribute parsing for GFF, GFF3 and GTF
 *
 * @module gff/attributes
 */

import type { GffDialect } from "./types";

/**
 * Parse an attribute column into an ordered name → value map
 *
 * Each `;`-separated segment is read as GFF3 `name=value` first and as
 * GTF `name "value"` second; segments matching neither are dropped. A
 * column yielding no pairs is plain GFF, whose whole text is the `group`.
 *
 * @example
 * ```typescript
 * parseGffAttributes('ID=gene1;Name=abc');               // ID → gene1, Name → abc
 * parseGffAttributes('gene_id "G1"; transcript_id "T1";'); // gene_id → G1, transcript_id → T1
 * parseGffAttributes('Gene00042');                        // group → Gene00042
 * ```
 *
 * @public
 */
export function parseGffAttributes(column: string): Map<string, string> {
  const attributes = new Map<string, string>();

  for (const segment of column.split(";")) {
    const trimmed = segment.trim();
    if (trimmed === "") continue;

    // '=' first: GFF3 values may contain spaces
    const pair = splitOnce(trimmed, "=") ?? splitOnce(trimmed, '"');
    if (pair === undefined) continue;

    const name = pair[0].trim();
    if (name === "") continue;

    attributes.set(name, stripValue(pair[1]));
  }

  if (attributes.size === 0) {
    attributes.set("group", column);
  }
  return attributes;
}

/**
 * Guess the dialect an attribute map was written in
 *
 * @public
 */
export function detectAttributeDialect(attributes: ReadonlyMap<string, string>): GffDialect {
  if (attributes.has("gene_id") || attributes.has("transcript_id")) {
    return "gtf";
  }
  if (attributes.size === 1 && attributes.has("group")) {
    return "gff";
  }
  return "gff3";
}

function splitOnce(text: string, separator: string): [string, string] | undefined {
  const index = text.indexOf(separator);
  if (index === -1) return undefined;
  return [text.slice(0, index), text.slice(index + separator.length)];
}

function stripValue(value: string): string {
  return value.replace(/^[\s"]+|[\s"]+$/g, "");
}
