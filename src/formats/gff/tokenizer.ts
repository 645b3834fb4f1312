/**
 * Line tokenizer for tab-delimited annotation files
 *
 * @module gff/tokenizer
 */

import { ParseError } from "../../errors";
import type { RawLine } from "../../types";
import type { GffComment, GffHeader } from "./types";

/**
 * What one pull from the tokenizer produces
 *
 * @public
 */
export type RawRecord =
  | { readonly kind: "fields"; readonly fields: string[] }
  | GffHeader
  | GffComment
  | { readonly kind: "end" };

/**
 * Tokenizer settings
 *
 * @public
 */
export interface TokenizerOptions {
  readonly maxLineLength: number;
  /** Prefixes marking comment lines; on the first non-blank line they mark the header */
  readonly commentPrefixes: readonly string[];
}

export const DEFAULT_COMMENT_PREFIXES = ["#", "track ", "browser "] as const;

const END: RawRecord = { kind: "end" };

/**
 * Pulls lines one at a time and classifies them
 *
 * Blank lines are consumed silently and their bytes are charged to the
 * next record returned. A prefixed first non-blank line is the header. `lineNumber`, `rawText` and `consumedSize`
 * describe the most recent `next()` call, including one that threw.
 *
 * @public
 */
export class RecordTokenizer {
  private readonly lines: AsyncIterator<RawLine>;
  private currentLineNumber = 0;
  private currentText = "";
  private lastConsumedSize = 0;
  private sawContent = false;

  constructor(
    lines: AsyncIterable<RawLine>,
    private readonly options: TokenizerOptions
  ) {
    this.lines = lines[Symbol.asyncIterator]();
  }

  /** Number of the last line read, 1-based */
  get lineNumber(): number {
    return this.currentLineNumber;
  }

  /** Text of the last line read */
  get rawText(): string {
    return this.currentText;
  }

  /** Bytes consumed by the last call to {@link RecordTokenizer.next} */
  get consumedSize(): number {
    return this.lastConsumedSize;
  }

  /**
   * @throws {ParseError} If the line exceeds `maxLineLength`
   */
  async next(): Promise<RawRecord> {
    this.lastConsumedSize = 0;

    for (;;) {
      const result = await this.lines.next();
      if (result.done === true) {
        return END;
      }

      const line = result.value;
      this.currentLineNumber++;
      this.currentText = line.text;
      this.lastConsumedSize += line.size;

      if (line.text.trim() === "") continue;

      const isFirst = !this.sawContent;
      this.sawContent = true;

      if (line.text.length > this.options.maxLineLength) {
        throw new ParseError(
          `Line too long (${line.text.length} > ${this.options.maxLineLength})`,
          "GFF",
          this.currentLineNumber
        );
      }

      return this.classify(line.text, isFirst);
    }
  }

  /**
   * Stop reading; releases the underlying line source
   */
  async close(): Promise<void> {
    await this.lines.return?.();
  }

  private classify(text: string, isFirst: boolean): RawRecord {
    const isComment = this.options.commentPrefixes.some((prefix) => text.startsWith(prefix));
    if (!isComment) {
      return { kind: "fields", fields: text.split("\t") };
    }

    const entry = {
      rawText: text,
      rawSize: this.lastConsumedSize,
      lineNumber: this.currentLineNumber,
    };
    return isFirst ? { kind: "header", ...entry } : { kind: "comment", ...entry };
  }
}
