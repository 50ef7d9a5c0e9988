/**
 * FASTQ record parser for strict four-line records
 *
 * Each record is exactly four lines: `@` header ending in a `/1` or `/2`
 * mate suffix, sequence, `+` separator, quality. Sequence and quality are
 * kept as opaque strings. Any framing violation aborts parsing with the
 * line number of the offending record; nothing is skipped or guessed past.
 *
 * The same framing runs for strings, line iterables, byte streams and
 * files, so all four entry points yield identical records for identical
 * text.
 */

import { type } from "arktype";
import { MalformedRecordError, ValidationError } from "../../errors";
import { createStream } from "../../io/file-reader";
import { readLines, splitLines } from "../../io/stream-utils";
import type { ParserOptions, ReadRecord } from "../../types";
import { LINES_PER_RECORD } from "./constants";
import { isValidHeader, isValidSeparator, parseMateSuffix } from "./primitives";

// =============================================================================
// ARKTYPE SCHEMAS
// =============================================================================

const ParserOptionsSchema = type({
  "trackLineNumbers?": "boolean",
});

// =============================================================================
// RECORD FRAMING
// =============================================================================

/**
 * Accumulates lines and emits a record every fourth line
 *
 * Line numbers are 1-based and count every line, empty ones included.
 */
class RecordFramer {
  private readonly buffer: string[] = [];
  private lineNumber: number;

  constructor(
    private readonly trackLineNumbers: boolean,
    startLineNumber = 1
  ) {
    this.lineNumber = startLineNumber - 1;
  }

  /**
   * Feed one line; returns a record when it completes one
   */
  push(line: string): ReadRecord | undefined {
    this.lineNumber++;
    this.buffer.push(line);

    // Fail on a bad header as soon as it is seen, not three lines later
    if (this.buffer.length === 1 && !isValidHeader(line)) {
      throw MalformedRecordError.headerMarker(this.lineNumber, line);
    }

    if (this.buffer.length < LINES_PER_RECORD) {
      return undefined;
    }

    const record = this.buildRecord(this.lineNumber - (LINES_PER_RECORD - 1));
    this.buffer.length = 0;
    return record;
  }

  /**
   * Signal end of input
   *
   * @throws {MalformedRecordError} If a record was left incomplete
   */
  finish(): void {
    if (this.buffer.length > 0) {
      const startLine = this.lineNumber - this.buffer.length + 1;
      throw MalformedRecordError.truncated(this.buffer.length, startLine, this.buffer[0]);
    }
  }

  private buildRecord(startLineNumber: number): ReadRecord {
    const [header = "", sequence = "", separator = "", quality = ""] = this.buffer;

    const { identifier, mate } = parseMateSuffix(header, startLineNumber);

    if (!isValidSeparator(separator)) {
      throw MalformedRecordError.separatorMarker(startLineNumber + 2, separator);
    }

    return {
      header: header.trimEnd(),
      identifier,
      mate,
      sequence,
      separator,
      quality,
      ...(this.trackLineNumbers && { lineNumber: startLineNumber }),
    };
  }
}

// =============================================================================
// PARSER
// =============================================================================

/**
 * Parser producing {@link ReadRecord} values from FASTQ text
 *
 * Every call starts from the beginning of its input, so parsing the same
 * content twice yields the same records. The returned sequences are lazy
 * and can be consumed once.
 *
 * @example
 * ```typescript
 * const parser = new ReadRecordParser();
 * for (const read of parser.parseString("@a/1\nACGT\n+\nIIII\n")) {
 *   console.log(read.identifier, read.mate); // "a" 1
 * }
 * ```
 */
export class ReadRecordParser {
  private readonly options: Required<ParserOptions>;

  constructor(options: ParserOptions = {}) {
    const validationResult = ParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(
        `Invalid FASTQ parser options: ${validationResult.summary}`,
        undefined,
        "FASTQ parser configuration"
      );
    }

    this.options = {
      trackLineNumbers: options.trackLineNumbers ?? true,
    };
  }

  /**
   * Parse records from a complete FASTQ string
   */
  *parseString(data: string): Generator<ReadRecord, void, undefined> {
    yield* this.parseLines(splitLines(data));
  }

  /**
   * Parse records from lines that have already been split
   *
   * @param lines - Lines without terminators
   * @param startLineNumber - Line number of the first line, for error context
   */
  *parseLines(lines: Iterable<string>, startLineNumber = 1): Generator<ReadRecord, void, undefined> {
    const framer = new RecordFramer(this.options.trackLineNumbers, startLineNumber);

    for (const line of lines) {
      const record = framer.push(line);
      if (record !== undefined) {
        yield record;
      }
    }

    framer.finish();
  }

  /**
   * Parse records from a UTF-8 byte stream
   */
  async *parse(stream: ReadableStream<Uint8Array>): AsyncGenerator<ReadRecord, void, undefined> {
    const framer = new RecordFramer(this.options.trackLineNumbers);

    for await (const line of readLines(stream)) {
      const record = framer.push(line);
      if (record !== undefined) {
        yield record;
      }
    }

    framer.finish();
  }

  /**
   * Parse records from a FASTQ file
   *
   * @throws {FileError} If the path is missing or not a regular file
   */
  async *parseFile(filePath: string): AsyncGenerator<ReadRecord, void, undefined> {
    yield* this.parse(await createStream(filePath));
  }
}
