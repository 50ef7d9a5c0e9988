/**
 * FASTQ record primitives - small pure functions shared by parser and writer
 */

import { MalformedRecordError, UnrecognizedMateSuffixError } from "../../errors";
import { Mate } from "../../types";
import { MARKERS, MATE_SUFFIX_PATTERN } from "./constants";

// ============================================================================
// HEADER PRIMITIVES
// ============================================================================

export function isValidHeader(line: string): boolean {
  return line.startsWith(MARKERS.HEADER);
}

export function isValidSeparator(line: string): boolean {
  return line.startsWith(MARKERS.SEPARATOR);
}

/**
 * Split a header into its pairing identifier and mate number
 *
 * Only the literal trailing `/1` and `/2` markers are recognized. Trailing
 * whitespace (including a stray `\r`) is ignored.
 *
 * @param header - Full header line, starting with `@`
 * @param lineNumber - Line of the header, for error context
 * @throws {UnrecognizedMateSuffixError} When the header has no `/1` or `/2` suffix
 * @throws {MalformedRecordError} When nothing precedes the suffix
 *
 * @example
 * ```typescript
 * parseMateSuffix("@read7/2");        // { identifier: "read7", mate: Mate.Second }
 * parseMateSuffix("@run:1:x/y/1");    // { identifier: "run:1:x/y", mate: Mate.First }
 * parseMateSuffix("@read7/3");        // throws UnrecognizedMateSuffixError
 * ```
 */
export function parseMateSuffix(
  header: string,
  lineNumber?: number
): { identifier: string; mate: Mate } {
  const name = header.trimEnd().slice(MARKERS.HEADER.length);
  const match = MATE_SUFFIX_PATTERN.exec(name);

  if (match === null) {
    throw new UnrecognizedMateSuffixError(header, lineNumber);
  }

  const [, identifier = "", mateDigit] = match;
  if (identifier === "") {
    throw MalformedRecordError.emptyName(lineNumber, header);
  }

  return { identifier, mate: mateDigit === "1" ? Mate.First : Mate.Second };
}

/**
 * Rebuild a header line from identifier and mate
 */
export function formatHeader(identifier: string, mate: Mate): string {
  return `${MARKERS.HEADER}${identifier}${MARKERS.MATE_DELIMITER}${mate}`;
}

// ============================================================================
// RECORD ASSEMBLY
// ============================================================================

/**
 * Join the four lines of a record, without a trailing newline
 */
export function assembleFastqRecord(
  header: string,
  sequence: string,
  separator: string,
  quality: string
): string {
  return `${header}\n${sequence}\n${separator}\n${quality}`;
}
