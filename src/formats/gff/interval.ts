/**
 * Construction of one annotation interval from its columns
 *
 * @module gff/interval
 */

import { MissingFieldError, ParseError } from "../../errors";
import type { Strand } from "../../types";
import { parseGffAttributes } from "./attributes";
import type { GffColumns, GffInterval, StrandPolicy } from "./types";
import { GFF_ATTRIBUTES_COL } from "./types";

const COORDINATE_PATTERN = /^\d+$/;

/**
 * Build an interval from the tab-separated fields of one line
 *
 * Coordinates stay in the file's 1-based closed convention. The fields are
 * kept verbatim in `rawFields`, whatever strand fix-up is applied.
 *
 * @throws {MissingFieldError} If a configured column is beyond the last field
 * @throws {ParseError} On non-integer coordinates, `end < start`, or an invalid strand
 *
 * @public
 */
export function buildGffInterval(
  fields: readonly string[],
  columns: GffColumns,
  strandPolicy: StrandPolicy,
  lineNumber: number
): GffInterval {
  const line = fields.join("\t");
  const field = (column: number, columnName: string): string => {
    const value = fields[column];
    if (value === undefined) {
      throw new MissingFieldError(column, columnName, lineNumber, line);
    }
    return value;
  };

  const chrom = field(columns.chromCol, "chrom_col").trim();
  const start = parseCoordinate(field(columns.startCol, "start_col"), "start", lineNumber, line);
  const end = parseCoordinate(field(columns.endCol, "end_col"), "end", lineNumber, line);
  if (end < start) {
    throw new ParseError(
      `Start is greater than end (${start} > ${end}); interval length is < 1`,
      "GFF",
      lineNumber,
      line
    );
  }

  const strand = resolveStrand(fields[columns.strandCol], strandPolicy, lineNumber, line);
  const featureType = field(columns.featureCol, "feature_col");
  const score = field(columns.scoreCol, "score_col");
  const attributes = parseGffAttributes(field(GFF_ATTRIBUTES_COL, "attributes_col"));

  return {
    kind: "interval",
    chrom,
    start,
    end,
    strand,
    score,
    featureType,
    attributes,
    rawFields: [...fields],
    lineNumber,
  };
}

function parseCoordinate(
  value: string,
  name: "start" | "end",
  lineNumber: number,
  line: string
): number {
  const trimmed = value.trim();
  if (!COORDINATE_PATTERN.test(trimmed)) {
    throw new ParseError(
      `Could not parse ${name} coordinate '${value}': expected a non-negative integer`,
      "GFF",
      lineNumber,
      line
    );
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * `.` means unknown strand and survives unless `fixStrand` is set
 */
function resolveStrand(
  value: string | undefined,
  policy: StrandPolicy,
  lineNumber: number,
  line: string
): Strand {
  if (value === undefined) return policy.defaultStrand;
  if (value === "+" || value === "-") return value;
  if (policy.fixStrand) return policy.defaultStrand;
  if (value === ".") return ".";

  throw new ParseError(
    `Invalid strand '${value}', must be '+', '-', or '.'`,
    "GFF",
    lineNumber,
    line
  );
}
