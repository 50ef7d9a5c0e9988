/**
 * Error handling for FASTQ detangling
 *
 * Every failure the pipeline can raise derives from {@link DetangleError}, so
 * callers can catch the whole family at once or narrow on a specific kind.
 * Errors carry the line number and offending text where one exists.
 */

import type { Mate } from "./types";

/**
 * Base error class for all detangle errors
 */
export class DetangleError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "DetangleError";
  }

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
 * Invalid caller input: options, paths, or an unusable input file
 */
export class ValidationError extends DetangleError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Input file exists but holds no bytes
 */
export class EmptyInputError extends ValidationError {
  constructor(public readonly filePath: string) {
    super(`Input file is empty: ${filePath}`);
    this.name = "EmptyInputError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends DetangleError {
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

/** Which framing rule a malformed record broke */
export type MalformedReason = "truncated" | "header-marker" | "separator-marker" | "empty-name";

/**
 * Structural violation of the four-line FASTQ framing
 */
export class MalformedRecordError extends ParseError {
  constructor(
    message: string,
    public readonly reason: MalformedReason,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "FASTQ", lineNumber, context);
    this.name = "MalformedRecordError";
  }

  static truncated(linesRemaining: number, lineNumber: number, context?: string): MalformedRecordError {
    return new MalformedRecordError(
      `Incomplete FASTQ record: expected 4 lines, got ${linesRemaining}`,
      "truncated",
      lineNumber,
      context
    );
  }

  static headerMarker(lineNumber: number, line: string): MalformedRecordError {
    return new MalformedRecordError(
      'FASTQ header must start with "@"',
      "header-marker",
      lineNumber,
      line
    );
  }

  static separatorMarker(lineNumber: number, line: string): MalformedRecordError {
    return new MalformedRecordError(
      'FASTQ separator must start with "+"',
      "separator-marker",
      lineNumber,
      line
    );
  }

  static emptyName(lineNumber: number | undefined, line: string): MalformedRecordError {
    return new MalformedRecordError(
      "FASTQ header has no read name before the mate suffix",
      "empty-name",
      lineNumber,
      line
    );
  }
}

/**
 * Header does not end in a literal `/1` or `/2`
 */
export class UnrecognizedMateSuffixError extends ParseError {
  constructor(
    public readonly header: string,
    lineNumber?: number
  ) {
    super(
      `Unrecognized mate suffix in header "${header}": expected a trailing /1 or /2`,
      "FASTQ",
      lineNumber,
      header
    );
    this.name = "UnrecognizedMateSuffixError";
  }
}

/**
 * Same identifier seen twice with the same mate number
 *
 * Usually means duplicated headers in the input. The pairing index never
 * overwrites an existing entry, so this always aborts the run.
 */
export class DuplicateMateError extends DetangleError {
  constructor(
    public readonly identifier: string,
    public readonly mate: Mate,
    public readonly recordIndex: number,
    lineNumber?: number
  ) {
    super(
      `Duplicate R${mate} read for identifier "${identifier}" at record ${recordIndex}`,
      "DUPLICATE_MATE",
      lineNumber,
      `@${identifier}/${mate}`
    );
    this.name = "DuplicateMateError";
  }
}

/**
 * File I/O errors with the path and operation that failed
 */
export class FileError extends DetangleError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "rename" | "remove",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    if (systemError instanceof FileError) return systemError;

    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }
}

/**
 * Stream processing errors for line reading
 */
export class StreamError extends DetangleError {
  constructor(
    message: string,
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}
