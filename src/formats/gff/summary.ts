/**
 * Skipped-line bookkeeping
 *
 * @module gff/summary
 */

import type { ParseSummary, SkippedLine } from "./types";
import { MAX_RETAINED_SKIPS } from "./types";

/**
 * @public
 */
export function createParseSummary(): ParseSummary {
  return { skipped: 0, skippedLines: [] };
}

/**
 * Count a skipped line, keeping its diagnostic only while fewer than
 * {@link MAX_RETAINED_SKIPS} are held
 *
 * @public
 */
export function recordSkippedLine(summary: ParseSummary, line: SkippedLine): void {
  summary.skipped++;
  if (summary.skippedLines.length < MAX_RETAINED_SKIPS) {
    summary.skippedLines.push(line);
  }
}
