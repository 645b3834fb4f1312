/**
 * Compression format detection for annotation files
 *
 * Detects gzip input from file extensions (`.gff3.gz`, `.gtf.gz`) or from
 * the gzip magic bytes.
 */

import type { CompressionFormat } from '../types';
import { CompressionError } from '../errors';

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_EXTENSIONS = ['.gz', '.gzip', '.bgz'] as const;

/**
 * Compression format detector
 *
 * @example
 * ```typescript
 * CompressionDetector.fromExtension('/data/genes.gtf.gz'); // 'gzip'
 * CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08])); // 'gzip'
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError('File path must not be empty', 'none', 'detect');
    }

    const normalizedPath = filePath.toLowerCase();
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? 'gzip' : 'none';
  }

  /**
   * Detect compression format from the first bytes of a file
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionFormat {
    return bytes.length >= 2 &&
      bytes[0] === GZIP_MAGIC_FIRST_BYTE &&
      bytes[1] === GZIP_MAGIC_SECOND_BYTE
      ? 'gzip'
      : 'none';
  }
}
