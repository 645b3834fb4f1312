/**
 * GFF (1-based, closed) to BED (0-based, half-open) coordinate conversion
 *
 * @module gff/coordinates
 */

import { GffFeature } from "./feature";
import type { GffInterval } from "./types";

/**
 * Anything whose coordinates can be converted; arrays hold `[start, end, ...]`
 *
 * @public
 */
export type CoordinateEntry = GffInterval | GffFeature | number[];

/**
 * Convert coordinates to BED convention in place
 *
 * Only `start` moves: a closed end equals the half-open end. A feature's
 * child intervals are converted with it. Not idempotent; apply once.
 *
 * @example
 * ```typescript
 * toBedCoordinates([100, 200]); // [99, 200]
 * ```
 *
 * @public
 */
export function toBedCoordinates(entry: GffFeature): GffFeature;
export function toBedCoordinates(entry: GffInterval): GffInterval;
export function toBedCoordinates(entry: number[]): number[];
export function toBedCoordinates(entry: CoordinateEntry): CoordinateEntry {
  if (Array.isArray(entry)) {
    const [start] = entry;
    if (start !== undefined) {
      entry[0] = start - 1;
    }
    return entry;
  }

  entry.start -= 1;
  if (entry instanceof GffFeature) {
    for (const interval of entry.intervals) {
      toBedCoordinates(interval);
    }
  }
  return entry;
}
