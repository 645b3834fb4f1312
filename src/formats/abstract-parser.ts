/**
 * Abstract base parser with shared option defaults and interrupt handling
 *
 * Each format keeps its own parsing logic; the base class only resolves the
 * options every parser understands and provides AbortSignal checks.
 */

import type { FileReaderOptions, ParserOptions } from "../types";
import { ParseError } from "../errors";

/**
 * Parser options after defaults have been applied
 */
export interface ResolvedParserOptions {
  readonly maxLineLength: number;
  readonly signal: AbortSignal | undefined;
  readonly onWarning: (warning: string, lineNumber?: number) => void;
}

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T> {
  protected readonly baseOptions: ResolvedParserOptions;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: ParserOptions) {
    this.baseOptions = {
      maxLineLength: options.maxLineLength ?? 1_000_000,
      signal: options.signal,
      onWarning:
        options.onWarning ??
        ((warning: string, lineNumber?: number): void => {
          console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
        }),
    };
    this.interruptHandler = new InterruptHandler(options.signal);
  }

  /**
   * Check abortion with format context
   * Call this in parsing loops to enable Ctrl+C interruption
   */
  protected throwIfAborted(context: string): void {
    this.interruptHandler.throwIfAborted(`${this.getFormatName()} ${context}`);
  }

  /**
   * Parse records from string data
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file, decompressing it if needed
   */
  abstract parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<T>;

  /**
   * Parse records from a binary stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format identifier used in messages (e.g. "GFF")
   */
  protected abstract getFormatName(): string;
}

/**
 * Interrupt handler utility for AbortSignal integration
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If operation was aborted
   */
  throwIfAborted(context: string): void {
    if (this.signal?.aborted === true) {
      throw new ParseError(`Operation aborted during ${context}`, "ABORTED");
    }
  }
}
