/**
 * Error handling for annotation parsing
 *
 * Every error carries a machine-readable code and, where it applies, the
 * source line number and the raw text that produced it.
 */

/**
 * Base error class for all gff-features errors
 */
export class AnnotationError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "AnnotationError";
  }

  /**
   * Render the message with line number and context appended
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for invalid options or inconsistent data
 */
export class ValidationError extends AnnotationError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for malformed records
 */
export class ParseError extends AnnotationError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * A configured column index lies beyond the record's last field
 */
export class MissingFieldError extends ParseError {
  constructor(
    public readonly column: number,
    public readonly columnName: string,
    lineNumber?: number,
    context?: string
  ) {
    super(`No field for ${columnName} (${column})`, "GFF", lineNumber, context);
    this.name = "MissingFieldError";
  }
}

/**
 * Intervals grouped into one feature disagree on chromosome
 *
 * Raised at feature assembly. The grouping identity matched, so the
 * input itself is inconsistent and the error is not recovered.
 */
export class ChromMismatchError extends ValidationError {
  constructor(
    public readonly expected: string,
    public readonly found: string,
    lineNumber?: number
  ) {
    super(
      `Interval chrom does not match feature chrom: ${found} != ${expected}`,
      lineNumber,
      "All intervals sharing a group, ID/Parent or transcript_id must be on one chromosome"
    );
    this.name = "ChromMismatchError";
  }
}

/**
 * Compression/decompression errors with detailed context
 */
export class CompressionError extends AnnotationError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "stream",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const msg = errorMessage.toLowerCase();
    const suggestion =
      msg.includes("magic") || msg.includes("header")
        ? `File may be corrupted or not actually ${format} compressed`
        : msg.includes("unexpected end") || msg.includes("truncated")
          ? "File appears to be truncated or incomplete"
          : undefined;

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  override toString(): string {
    let msg = super.toString();
    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }
    return msg;
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends AnnotationError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat" | "open",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }
    return msg;
  }
}

/**
 * Stream processing errors
 */
export class StreamError extends AnnotationError {
  constructor(
    message: string,
    public readonly streamType: "read" | "transform",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Buffer management errors for streaming operations
 */
export class BufferError extends AnnotationError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly operation: "overflow",
    context?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}
