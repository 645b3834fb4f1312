/**
 * GFF/GFF3/GTF type definitions
 *
 * A stream of annotation lines becomes a stream of records: headers and
 * comments pass through untouched, and annotation lines sharing a group
 * identity are collected into one {@link GffFeature}.
 *
 * @module gff/types
 */

import type { ParserOptions, Strand } from "../../types";
import type { GffFeature } from "./feature";

/**
 * Attribute dialects recognised in the ninth column
 *
 * @public
 */
export type GffDialect = "gff" | "gff3" | "gtf";

/**
 * Column indices used to read one annotation line
 *
 * @public
 */
export interface GffColumns {
  readonly chromCol: number;
  readonly featureCol: number;
  readonly startCol: number;
  readonly endCol: number;
  readonly strandCol: number;
  readonly scoreCol: number;
}

/**
 * Strand handling applied while building intervals
 *
 * @public
 */
export interface StrandPolicy {
  /** Strand used when the column is missing or fixed up */
  readonly defaultStrand: Strand;
  /** Replace `.` and invalid strand values with `defaultStrand` */
  readonly fixStrand: boolean;
}

/**
 * One annotation line
 *
 * @public
 */
export interface GffInterval {
  readonly kind: "interval";
  /** Chromosome or sequence name */
  readonly chrom: string;
  /** Start coordinate, 1-based inclusive until converted */
  start: number;
  /** End coordinate (inclusive, equal to the half-open end) */
  readonly end: number;
  /** `.` is kept as unknown strand unless fixed up */
  readonly strand: Strand;
  /** Raw score column; often `.` */
  readonly score: string;
  /** Feature type column (e.g. "exon", "CDS") */
  readonly featureType: string;
  /** Parsed ninth column, in source order */
  readonly attributes: ReadonlyMap<string, string>;
  /** Columns exactly as read */
  readonly rawFields: readonly string[];
  readonly lineNumber: number;
}

/**
 * First-line header, e.g. `##gff-version 3`
 *
 * @public
 */
export interface GffHeader {
  readonly kind: "header";
  readonly rawText: string;
  /** Bytes consumed for this line, terminator included */
  readonly rawSize: number;
  readonly lineNumber: number;
}

/**
 * Comment line (`#`, `track `, `browser `)
 *
 * @public
 */
export interface GffComment {
  readonly kind: "comment";
  readonly rawText: string;
  readonly rawSize: number;
  readonly lineNumber: number;
}

/**
 * Element of the record stream
 *
 * @public
 */
export type GffRecord = GffHeader | GffComment | GffFeature;

/**
 * Diagnostic retained for a skipped line
 *
 * @public
 */
export interface SkippedLine {
  readonly lineNumber: number;
  readonly rawText: string;
  readonly message: string;
}

/**
 * Running count of skipped lines for one stream
 *
 * Only the first {@link MAX_RETAINED_SKIPS} diagnostics are kept.
 *
 * @public
 */
export interface ParseSummary {
  skipped: number;
  readonly skippedLines: SkippedLine[];
}

/**
 * GFF reader configuration options
 *
 * @public
 */
export interface GffReaderOptions extends ParserOptions, Partial<GffColumns>, Partial<StrandPolicy> {
  /** Convert every emitted feature to 0-based half-open coordinates */
  convertToBedCoord?: boolean;
}

/**
 * Standard nine-column layout
 *
 * @public
 */
export const GFF_DEFAULT_COLUMNS: GffColumns = {
  chromCol: 0,
  featureCol: 2,
  startCol: 3,
  endCol: 4,
  scoreCol: 5,
  strandCol: 6,
};

/** Column holding the attributes in every dialect */
export const GFF_ATTRIBUTES_COL = 8;

/** Skipped-line diagnostics kept per stream */
export const MAX_RETAINED_SKIPS = 10;

/**
 * Attribute names tried, in order, when naming a feature
 *
 * @public
 */
export const FEATURE_NAME_ATTRIBUTES = ["gene_id", "transcript_id", "ID", "id", "group"] as const;
