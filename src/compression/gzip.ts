/**
 * Streaming gzip decompression
 *
 * Bridges Node's zlib gunzip into a web TransformStream so decompression
 * composes with `ReadableStream.pipeThrough`.
 */

import { createGunzip } from 'node:zlib';
import { CompressionError } from '../errors';

const DEFAULT_CHUNK_SIZE = 65536;

/**
 * Create gzip decompression transform stream
 *
 * @param chunkSize zlib output chunk size in bytes
 *
 * @example
 * ```typescript
 * const decompressed = compressedStream.pipeThrough(createStream());
 * ```
 */
export function createStream(
  chunkSize: number = DEFAULT_CHUNK_SIZE
): TransformStream<Uint8Array, Uint8Array> {
  const gunzip = createGunzip({ chunkSize });
  let bytesProcessed = 0;

  return new TransformStream<Uint8Array, Uint8Array>({
    start(controller): void {
      gunzip.on('data', (chunk: Buffer) => {
        controller.enqueue(new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.byteLength));
      });
      gunzip.on('error', (error: unknown) => {
        controller.error(
          CompressionError.fromSystemError('gzip', 'stream', error, bytesProcessed)
        );
      });
    },
    transform(chunk): void {
      bytesProcessed += chunk.length;
      gunzip.write(chunk);
    },
    flush(): Promise<void> {
      return new Promise<void>((resolve) => {
        // Errors have already been forwarded to the controller by the listener above
        gunzip.once('end', () => resolve());
        gunzip.once('error', () => resolve());
        gunzip.end();
      });
    },
  });
}

/**
 * Wrap compressed readable stream with gzip decompression
 */
export function wrapStream(
  input: ReadableStream<Uint8Array>,
  chunkSize?: number
): ReadableStream<Uint8Array> {
  return input.pipeThrough(createStream(chunkSize));
}

export const GzipDecompressor = {
  createStream,
  wrapStream,
} as const;
