/**
 * Compression support for annotation files
 *
 * @example Streaming decompression
 * ```typescript
 * import { CompressionDetector, GzipDecompressor } from '../compression';
 *
 * if (CompressionDetector.fromExtension(path) === 'gzip') {
 *   stream = GzipDecompressor.wrapStream(stream);
 * }
 * ```
 */

import type { CompressionFormat } from '../types';
import { GzipDecompressor } from './gzip';

export { CompressionDetector } from './detector';
export { GzipDecompressor } from './gzip';
export type { CompressionFormat } from '../types';

/**
 * Apply the decompressor for a format to a stream; `none` passes it through
 */
export function decompressStream(
  stream: ReadableStream<Uint8Array>,
  format: CompressionFormat,
  chunkSize?: number
): ReadableStream<Uint8Array> {
  switch (format) {
    case 'gzip':
      return GzipDecompressor.wrapStream(stream, chunkSize);
    case 'none':
      return stream;
  }
}
