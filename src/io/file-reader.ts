/**
 * File reading utilities built on the Effect platform file system
 *
 * Opens annotation files as byte streams, validating the path and size
 * first and decompressing gzip input transparently, whether it is named
 * `.gz` or only starts with the gzip magic bytes.
 */

import { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { type } from "arktype";
import { Effect, Option, Stream } from "effect";
import { CompressionDetector, decompressStream } from "../compression";
import { FileError } from "../errors";
import type { FileMetadata, FilePath, FileReaderOptions, FileValidationResult } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536,
  maxFileSize: 10_000_000_000, // 10GB, whole-genome annotation files are large
  autoDecompress: true,
  compressionFormat: "none", // auto-detected from the extension, then the magic bytes
};

/**
 * Check if a file exists and is a regular file
 *
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(NodeContext.layer)));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Get file metadata
 *
 * @throws {FileError} If file cannot be accessed
 */
export async function getMetadata(path: string): Promise<FileMetadata> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);

    return {
      path: validatedPath,
      size: Number(info.size),
      lastModified: Option.getOrElse(info.mtime, () => new Date(0)),
      extension: validatedPath.substring(validatedPath.lastIndexOf(".")),
    };
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(NodeContext.layer)));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Create a streaming reader for a file
 *
 * @throws {FileError} If file cannot be opened or exceeds the size limit
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const validation = await validateFile(validatedPath, mergedOptions);
  if (!validation.isValid) {
    throw new FileError(validation.error ?? "File validation failed", validatedPath, "read");
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const effectStream = fs.stream(validatedPath, {
      chunkSize: mergedOptions.bufferSize,
    });
    return Stream.toReadableStream(effectStream);
  });

  let stream: ReadableStream<Uint8Array>;
  try {
    stream = await Effect.runPromise(program.pipe(Effect.provide(NodeContext.layer)));
  } catch (error) {
    throw FileError.fromSystemError("open", validatedPath, error);
  }

  if (!mergedOptions.autoDecompress) {
    return stream;
  }

  if (
    mergedOptions.compressionFormat === "gzip" ||
    CompressionDetector.fromExtension(validatedPath) === "gzip"
  ) {
    return decompressStream(stream, "gzip");
  }
  return decompressByContent(stream, validatedPath);
}

export const FileReader = {
  exists,
  getMetadata,
  createStream,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

async function validateFile(
  path: FilePath,
  options: Required<FileReaderOptions>
): Promise<FileValidationResult> {
  if (!(await exists(path))) {
    return {
      isValid: false,
      error: "File does not exist or is not accessible",
    };
  }

  const metadata = await getMetadata(path);
  if (metadata.size > options.maxFileSize) {
    return {
      isValid: false,
      metadata,
      error: `File size ${metadata.size} exceeds maximum ${options.maxFileSize}`,
    };
  }

  return { isValid: true, metadata };
}

/**
 * Sniff the first chunk for gzip magic bytes; the returned stream still
 * starts at byte 0
 */
async function decompressByContent(
  stream: ReadableStream<Uint8Array>,
  path: FilePath
): Promise<ReadableStream<Uint8Array>> {
  const [head, body] = stream.tee();
  const reader = head.getReader();

  let first: ReadableStreamReadResult<Uint8Array>;
  try {
    first = await reader.read();
  } catch (error) {
    throw FileError.fromSystemError("read", path, error);
  }
  await reader.cancel();

  const format = first.done ? "none" : CompressionDetector.fromMagicBytes(first.value);
  return decompressStream(body, format);
}

/**
 * Validate file path using ArkType and return branded type
 */
function validatePath(path: string): FilePath {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const merged = { ...DEFAULT_OPTIONS, ...options };

  const validationResult = FileReaderOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return merged;
}
