/**
 * FASTQ record writer
 *
 * Symmetric to {@link ReadRecordParser}: formatting a parsed record and
 * parsing the result gives back the same identifier, mate, sequence,
 * separator and quality.
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import type { ReadRecord } from "../../types";
import { MARKERS } from "./constants";
import { assembleFastqRecord, formatHeader } from "./primitives";

export interface ReadRecordWriterOptions {
  /**
   * Keep the separator line as read (`+name`) instead of writing a bare `+`
   * (default: true)
   */
  preserveSeparator?: boolean;
}

const ReadRecordWriterOptionsSchema = type({
  "preserveSeparator?": "boolean",
});

/**
 * Formats read records as four-line FASTQ text
 *
 * @example
 * ```typescript
 * const writer = new ReadRecordWriter();
 * writer.formatRecord(read); // "@a/1\nACGT\n+\nIIII"
 * ```
 */
export class ReadRecordWriter {
  private readonly preserveSeparator: boolean;

  constructor(options: ReadRecordWriterOptions = {}) {
    const validationResult = ReadRecordWriterOptionsSchema(options);

    if (validationResult instanceof type.errors) {
      throw new ValidationError(
        `Invalid FASTQ writer options: ${validationResult.summary}`,
        undefined,
        "FASTQ writer configuration"
      );
    }

    this.preserveSeparator = options.preserveSeparator ?? true;
  }

  /**
   * Format one record without a trailing newline
   *
   * The header is rebuilt from identifier and mate number.
   */
  formatRecord(record: ReadRecord): string {
    const separator = this.preserveSeparator ? record.separator : MARKERS.SEPARATOR;
    return assembleFastqRecord(
      formatHeader(record.identifier, record.mate),
      record.sequence,
      separator,
      record.quality
    );
  }

  /**
   * Format records in the given order, each terminated by a newline
   *
   * @returns Empty string for an empty list
   */
  formatRecords(records: Iterable<ReadRecord>): string {
    let output = "";
    for (const record of records) {
      output += `${this.formatRecord(record)}\n`;
    }
    return output;
  }
}
