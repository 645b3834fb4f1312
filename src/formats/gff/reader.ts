/**
 * Streaming GFF/GFF3/GTF reader
 *
 * @module gff/reader
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import { createStream } from "../../io/file-reader";
import { readLines, readLinesFromString } from "../../io/stream-utils";
import type { FileReaderOptions, RawLine } from "../../types";
import { AbstractParser } from "../abstract-parser";
import type { GroupingSettings } from "./grouping";
import { createGroupingState, groupRecords } from "./grouping";
import { createParseSummary } from "./summary";
import type { TokenizerOptions } from "./tokenizer";
import { DEFAULT_COMMENT_PREFIXES, RecordTokenizer } from "./tokenizer";
import type { GffColumns, GffReaderOptions, GffRecord, ParseSummary, StrandPolicy } from "./types";
import { GFF_DEFAULT_COLUMNS } from "./types";

const columnIndex = "number.integer>=0";

/**
 * ArkType validation for GFF reader options
 */
const GffReaderOptionsSchema = type({
  "chromCol?": columnIndex,
  "featureCol?": columnIndex,
  "startCol?": columnIndex,
  "endCol?": columnIndex,
  "strandCol?": columnIndex,
  "scoreCol?": columnIndex,
  "defaultStrand?": '"+"|"-"|"."',
  "fixStrand?": "boolean",
  "convertToBedCoord?": "boolean",
  "maxLineLength?": "number>0",
}).narrow((options, ctx) => {
  if (options.maxLineLength !== undefined && options.maxLineLength > 10_000_000) {
    return ctx.reject({
      path: ["maxLineLength"],
      expected: "at most 10MB",
      actual: `${options.maxLineLength}`,
    });
  }
  if (options.startCol !== undefined && options.startCol === options.endCol) {
    return ctx.reject({
      path: ["startCol", "endCol"],
      expected: "different start and end columns",
      actual: `both ${options.startCol}`,
    });
  }
  return true;
});

/**
 * One pass over one input
 *
 * Iterable once: a second `for await` finds the stream exhausted. The
 * summary fills in while the records are consumed.
 *
 * @public
 */
export class GffRecordStream implements AsyncIterable<GffRecord> {
  readonly summary: ParseSummary = createParseSummary();
  private readonly records: AsyncGenerator<GffRecord, void, undefined>;

  constructor(
    lines: AsyncIterable<RawLine>,
    tokenizerOptions: TokenizerOptions,
    settings: GroupingSettings
  ) {
    const tokenizer = new RecordTokenizer(lines, tokenizerOptions);
    this.records = groupRecords(tokenizer, createGroupingState(this.summary), settings);
  }

  [Symbol.asyncIterator](): AsyncIterator<GffRecord> {
    return this.records;
  }
}

/**
 * Streaming reader that groups annotation lines into features
 *
 * Lines are grouped by GFF `group`, GFF3 `ID`/`Parent` or GTF
 * `transcript_id`. Malformed lines are skipped and reported through
 * `onWarning` and the stream's `summary`.
 *
 * @example GTF transcripts
 * ```typescript
 * const reader = new GffReader();
 * for await (const record of reader.parseString(gtfData)) {
 *   if (record.kind === "feature") {
 *     console.log(`${record.name()}: ${record.intervals.length} exons`);
 *   }
 * }
 * ```
 *
 * @example BED coordinates for interval tools
 * ```typescript
 * const reader = new GffReader({ convertToBedCoord: true, fixStrand: true, defaultStrand: "+" });
 * const records = reader.parseFile("genes.gff3.gz");
 * for await (const record of records) {
 *   // record.start is 0-based here
 * }
 * console.log(`skipped ${records.summary.skipped} lines`);
 * ```
 *
 * @public
 */
export class GffReader extends AbstractParser<GffRecord> {
  private readonly columns: GffColumns;
  private readonly strandPolicy: StrandPolicy;
  private readonly convertToBedCoord: boolean;

  /**
   * @throws {ValidationError} If an option is out of range
   */
  constructor(options: GffReaderOptions = {}) {
    const validationResult = GffReaderOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(
        `Invalid GFF reader options: ${validationResult.summary}`,
        undefined,
        "Column indices are 0-based; strand is one of '+', '-', '.'"
      );
    }

    super(options);
    this.columns = {
      chromCol: options.chromCol ?? GFF_DEFAULT_COLUMNS.chromCol,
      featureCol: options.featureCol ?? GFF_DEFAULT_COLUMNS.featureCol,
      startCol: options.startCol ?? GFF_DEFAULT_COLUMNS.startCol,
      endCol: options.endCol ?? GFF_DEFAULT_COLUMNS.endCol,
      strandCol: options.strandCol ?? GFF_DEFAULT_COLUMNS.strandCol,
      scoreCol: options.scoreCol ?? GFF_DEFAULT_COLUMNS.scoreCol,
    };
    this.strandPolicy = {
      defaultStrand: options.defaultStrand ?? ".",
      fixStrand: options.fixStrand ?? false,
    };
    this.convertToBedCoord = options.convertToBedCoord ?? false;
  }

  protected getFormatName(): string {
    return "GFF";
  }

  override parseString(data: string): GffRecordStream {
    return this.parseLines(readLinesFromString(data));
  }

  override parse(stream: ReadableStream<Uint8Array>): GffRecordStream {
    return this.parseLines(readLines(stream));
  }

  /**
   * Parse a file; `.gz` input is decompressed
   *
   * The file is opened when iteration starts.
   *
   * @throws {ValidationError} If the path is empty
   */
  override parseFile(filePath: string, options?: FileReaderOptions): GffRecordStream {
    if (filePath.length === 0) {
      throw new ValidationError("filePath cannot be empty");
    }
    return this.parseLines(fileLines(filePath, options));
  }

  private parseLines(lines: AsyncIterable<RawLine>): GffRecordStream {
    return new GffRecordStream(
      lines,
      {
        maxLineLength: this.baseOptions.maxLineLength,
        commentPrefixes: DEFAULT_COMMENT_PREFIXES,
      },
      {
        columns: this.columns,
        strandPolicy: this.strandPolicy,
        convertToBedCoord: this.convertToBedCoord,
        onWarning: this.baseOptions.onWarning,
        checkAborted: () => this.throwIfAborted("record grouping"),
      }
    );
  }
}

async function* fileLines(
  filePath: string,
  options: FileReaderOptions | undefined
): AsyncIterable<RawLine> {
  const stream = await createStream(filePath, options);
  yield* readLines(stream);
}
