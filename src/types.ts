/**
 * Shared type definitions for annotation parsing and I/O
 *
 * Format-specific types live beside their parsers (see `formats/gff/types`).
 */

import { type } from "arktype";

/**
 * Strand orientation
 */
export type Strand = "+" | "-" | ".";

/**
 * Options common to every format parser
 */
export interface ParserOptions {
  /** Maximum line length before the line is rejected */
  maxLineLength?: number;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom warning handler, called for every recovered problem */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * One line of source text
 */
export interface RawLine {
  /** Line content without its terminator */
  readonly text: string;
  /** Bytes the line occupied in the source, terminator included */
  readonly size: number;
}

/**
 * Line processing result for streaming text files
 */
export interface LineProcessingResult {
  /** Complete lines extracted from buffer */
  readonly lines: RawLine[];
  /** Bytes of the incomplete last line, carried into the next chunk */
  readonly remainder: Uint8Array;
}

/**
 * Compression formats recognised by the file reader
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Branded type for validated file paths
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

/**
 * File reading configuration options
 */
export interface FileReaderOptions {
  /** Buffer size for streaming reads (default: 64KB) */
  readonly bufferSize?: number;
  /** Maximum file size to prevent memory exhaustion (default: 10GB) */
  readonly maxFileSize?: number;
  /** Whether to decompress gzip input automatically (default: true) */
  readonly autoDecompress?: boolean;
  /** Override compression format detection (default: auto-detect) */
  readonly compressionFormat?: CompressionFormat;
}

/**
 * File metadata gathered before a read
 */
export interface FileMetadata {
  readonly path: FilePath;
  /** File size in bytes */
  readonly size: number;
  readonly lastModified: Date;
  /** File extension for format detection */
  readonly extension: string;
}

/**
 * File validation result with detailed feedback
 */
export interface FileValidationResult {
  readonly isValid: boolean;
  readonly metadata?: FileMetadata;
  readonly error?: string;
}

/**
 * File path validation schema
 * Rejects empty paths and embedded null bytes, normalizes separators
 */
export const FilePathSchema = type("string>0")
  .narrow((path, ctx) => {
    if (path.includes("\0")) {
      return ctx.reject({
        expected: "a path without null characters",
        actual: "a path containing \\0",
      });
    }
    return true;
  })
  .pipe((path): FilePath => {
    const normalized = path.replace(/[\\/]+/g, "/");
    return normalized as FilePath;
  });

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "number.integer>=1024",
  "maxFileSize?": "number>=0",
  "autoDecompress?": "boolean",
  "compressionFormat?": '"gzip"|"none"',
}).narrow((options, ctx) => {
  if (options.bufferSize !== undefined && options.bufferSize > 1_048_576) {
    return ctx.reject({
      path: ["bufferSize"],
      expected: "a buffer of at most 1MB",
      actual: `${options.bufferSize} bytes`,
    });
  }
  return true;
});
