/**
 * Multi-interval annotation features
 *
 * @module gff/feature
 */

import { ChromMismatchError } from "../../errors";
import type { Strand } from "../../types";
import type { GffInterval } from "./types";
import { FEATURE_NAME_ATTRIBUTES } from "./types";

/**
 * An ordered group of intervals sharing one group identity
 *
 * Representative fields come from the first (seed) interval; the bounds
 * span every child. A feature owns its intervals: {@link GffFeature.assemble}
 * copies the array it is given.
 *
 * @example
 * ```typescript
 * const feature = GffFeature.assemble([exon1, exon2], rawSize);
 * console.log(`${feature.name()} ${feature.chrom}:${feature.start}-${feature.end}`);
 * ```
 *
 * @public
 */
export class GffFeature {
  readonly kind = "feature";

  private constructor(
    readonly chrom: string,
    public start: number,
    readonly end: number,
    readonly strand: Strand,
    readonly score: string,
    readonly featureType: string,
    readonly attributes: ReadonlyMap<string, string>,
    readonly intervals: readonly GffInterval[],
    /** Source bytes consumed while assembling this feature */
    readonly rawSize: number
  ) {}

  /**
   * Assemble a feature from its intervals
   *
   * @throws {ChromMismatchError} If any interval lies on another chromosome than the seed
   */
  static assemble(intervals: readonly [GffInterval, ...GffInterval[]], rawSize: number): GffFeature {
    const [seed, ...rest] = intervals;
    let start = seed.start;
    let end = seed.end;

    for (const interval of rest) {
      if (interval.chrom !== seed.chrom) {
        throw new ChromMismatchError(seed.chrom, interval.chrom, interval.lineNumber);
      }
      start = Math.min(start, interval.start);
      end = Math.max(end, interval.end);
    }

    return new GffFeature(
      seed.chrom,
      start,
      end,
      seed.strand,
      seed.score,
      seed.featureType,
      new Map(seed.attributes),
      [...intervals],
      rawSize
    );
  }

  /**
   * Feature name: the first of gene_id, transcript_id, ID, id, group present
   */
  name(): string | undefined {
    for (const attribute of FEATURE_NAME_ATTRIBUTES) {
      const value = this.attributes.get(attribute);
      if (value !== undefined) return value;
    }
    return undefined;
  }

  /**
   * Source lines of the child intervals, in order
   */
  lines(): string[] {
    return this.intervals.map((interval) => interval.rawFields.join("\t"));
  }
}
