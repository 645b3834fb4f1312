/**
 * Stream processing utilities for line-oriented text
 *
 * Lines are split on the raw bytes and yielded together with the number of
 * bytes they occupied in the source, terminator included. Sizes never come
 * from re-encoding the decoded text, so a byte-order mark or an invalid
 * UTF-8 sequence is still charged at its source width.
 */

import { BufferError, StreamError } from "../errors";
import type { LineProcessingResult, RawLine } from "../types";

const MAX_LINE_LENGTH = 10_000_000;
const MAX_BUFFER_SIZE = 10_485_760; // 10MB max buffer

const LF = 0x0a;
const CR = 0x0d;

const decoder = new TextDecoder("utf-8");

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Chunks need not align with line boundaries; a `\r\n` split across two
 * chunks is still one terminator. Stopping early cancels the stream.
 *
 * @throws {StreamError} If reading from the stream fails
 * @throws {BufferError} If a line or the pending buffer grows past its limit
 * @example
 * ```typescript
 * const stream = await createStream('/data/annotation.gff3.gz');
 * for await (const line of readLines(stream)) {
 *   console.log(line.text, line.size);
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncIterable<RawLine> {
  const reader = stream.getReader();
  let buffer: Uint8Array = new Uint8Array(0);
  let totalBytesProcessed = 0;
  let settled = false;

  try {
    while (true) {
      let chunk: ReadableStreamReadResult<Uint8Array>;
      try {
        chunk = await reader.read();
      } catch (error) {
        settled = true;
        throw new StreamError(
          `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
          "read",
          totalBytesProcessed
        );
      }

      if (chunk.done) {
        settled = true;
        break;
      }

      buffer = concatBytes(buffer, chunk.value);
      totalBytesProcessed += chunk.value.length;

      const result = processBuffer(buffer);
      buffer = result.remainder;
      yield* result.lines;

      if (buffer.length > MAX_BUFFER_SIZE) {
        throw new BufferError(
          `Buffer overflow: ${buffer.length} bytes exceeds maximum ${MAX_BUFFER_SIZE}`,
          buffer.length,
          "overflow"
        );
      }
    }

    yield* flushBuffer(buffer);
  } finally {
    try {
      if (!settled) {
        await reader.cancel();
      }
    } finally {
      reader.releaseLock();
    }
  }
}

/**
 * Split an in-memory string into lines; sizes are its UTF-8 byte counts
 */
export async function* readLinesFromString(data: string): AsyncIterable<RawLine> {
  yield* flushBuffer(new TextEncoder().encode(data));
}

/**
 * Extract complete lines from a byte buffer
 *
 * Handles `\n`, `\r\n` and `\r` endings. A `\r` at the very end of the
 * buffer stays in the remainder until the next chunk shows whether a `\n`
 * follows it.
 *
 * @throws {BufferError} If a single line exceeds the maximum length
 */
export function processBuffer(buffer: Uint8Array): LineProcessingResult {
  return splitBuffer(buffer, false);
}

function* flushBuffer(buffer: Uint8Array): Iterable<RawLine> {
  const result = splitBuffer(buffer, true);
  yield* result.lines;
  if (result.remainder.length > 0) {
    yield decodeLine(result.remainder, 0);
  }
}

function splitBuffer(buffer: Uint8Array, final: boolean): LineProcessingResult {
  const lines: RawLine[] = [];
  let cursor = 0;

  for (let index = 0; index < buffer.length; index++) {
    const byte = buffer[index];
    if (byte !== LF && byte !== CR) continue;

    let terminatorLength = 1;
    if (byte === CR) {
      if (index + 1 < buffer.length) {
        if (buffer[index + 1] === LF) terminatorLength = 2;
      } else if (!final) {
        break;
      }
    }

    lines.push(decodeLine(buffer.subarray(cursor, index), terminatorLength));
    index += terminatorLength - 1;
    cursor = index + 1;
  }

  return { lines, remainder: buffer.subarray(cursor) };
}

function decodeLine(bytes: Uint8Array, terminatorLength: number): RawLine {
  if (bytes.length > MAX_LINE_LENGTH) {
    throw new BufferError(
      `Line too long: ${bytes.length} bytes exceeds maximum ${MAX_LINE_LENGTH}`,
      bytes.length,
      "overflow"
    );
  }
  return { text: decoder.decode(bytes), size: bytes.length + terminatorLength };
}

function concatBytes(head: Uint8Array, tail: Uint8Array): Uint8Array {
  if (head.length === 0) return tail;
  const joined = new Uint8Array(head.length + tail.length);
  joined.set(head, 0);
  joined.set(tail, head.length);
  return joined;
}
