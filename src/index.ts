/**
 * gff-features - streaming GFF, GFF3 and GTF feature grouping
 *
 * Reads tab-delimited genome annotation, groups the lines of each gene,
 * transcript or GFF group into one feature, and optionally converts
 * coordinates to the 0-based half-open convention of BED tools.
 */

// Compression infrastructure
export { CompressionDetector, decompressStream, GzipDecompressor } from './compression';
// Error types
export {
  AnnotationError,
  BufferError,
  ChromMismatchError,
  CompressionError,
  FileError,
  MissingFieldError,
  ParseError,
  StreamError,
  ValidationError,
} from './errors';
// Annotation formats
export * from './formats';
// File I/O infrastructure
export { FileReader } from './io/file-reader';
export { processBuffer, readLines, readLinesFromString } from './io/stream-utils';
// Core types
export type {
  CompressionFormat,
  FileMetadata,
  FilePath,
  FileReaderOptions,
  ParserOptions,
  RawLine,
  Strand,
} from './types';
