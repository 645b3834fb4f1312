/**
 * GFF / GFF3 / GTF module exports
 *
 * Reads tab-delimited annotation files and groups related lines into
 * multi-interval features: by the `group` column in GFF, by `ID`/`Parent`
 * in GFF3 and by `transcript_id` in GTF.
 *
 * @example Grouping transcripts
 * ```typescript
 * import { GffReader } from 'gff-features';
 *
 * const reader = new GffReader({ convertToBedCoord: true });
 * for await (const record of reader.parseString(gtfData)) {
 *   if (record.kind === 'feature') {
 *     console.log(`${record.name()} ${record.chrom}:${record.start}-${record.end}`);
 *   }
 * }
 * ```
 *
 * @module gff
 */

import { detectAttributeDialect, parseGffAttributes } from "./attributes";
import { toBedCoordinates } from "./coordinates";
import { buildGffInterval } from "./interval";
import { detectGffFormat, filterFeaturesByType } from "./utils";

const GffFormat = {
  parseGffAttributes,
  detectAttributeDialect,
  buildGffInterval,
  toBedCoordinates,
} as const;

const GffUtils = {
  detectGffFormat,
  filterFeaturesByType,
} as const;

// =============================================================================
// EXPORTS
// =============================================================================

export { detectAttributeDialect, parseGffAttributes } from "./attributes";
export { type CoordinateEntry, toBedCoordinates } from "./coordinates";
export { GffFeature } from "./feature";
export { buildGffInterval } from "./interval";
export { GffReader, GffRecordStream } from "./reader";
export { createParseSummary, recordSkippedLine } from "./summary";
export {
  DEFAULT_COMMENT_PREFIXES,
  type RawRecord,
  RecordTokenizer,
  type TokenizerOptions,
} from "./tokenizer";

export type {
  GffColumns,
  GffComment,
  GffDialect,
  GffHeader,
  GffInterval,
  GffReaderOptions,
  GffRecord,
  ParseSummary,
  SkippedLine,
  StrandPolicy,
} from "./types";

export {
  FEATURE_NAME_ATTRIBUTES,
  GFF_ATTRIBUTES_COL,
  GFF_DEFAULT_COLUMNS,
  MAX_RETAINED_SKIPS,
} from "./types";

export { detectGffFormat, filterFeaturesByType } from "./utils";

export { GffFormat, GffUtils };
