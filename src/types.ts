/**
 * Core type definitions for detangling interleaved FASTQ data
 *
 * Records are fixed-field values tagged by mate number, so a malformed
 * shape is rejected by the parser instead of surfacing during
 * classification.
 */

import { type } from "arktype";

// =============================================================================
// READ RECORDS
// =============================================================================

/**
 * Which end of the fragment a read came from
 *
 * The numeric value is the literal mate suffix used in headers (`/1`, `/2`).
 */
export enum Mate {
  First = 1,
  Second = 2,
}

/**
 * One four-line FASTQ record
 *
 * Created once by the parser and never mutated afterwards.
 */
export interface ReadRecord {
  /** Header line including `@` and the mate suffix, trailing whitespace removed */
  readonly header: string;
  /** Read name without `@` and without the mate suffix; the pairing key */
  readonly identifier: string;
  readonly mate: Mate;
  /** Base calls, not validated against any alphabet */
  readonly sequence: string;
  /** Third line of the record, kept as read (`+` with optional trailing text) */
  readonly separator: string;
  /** Quality line, not validated or cross-checked against the sequence */
  readonly quality: string;
  /** 1-based line number of the header, when line tracking is enabled */
  readonly lineNumber?: number;
}

// =============================================================================
// DETANGLE RESULTS
// =============================================================================

/** Names of the four output buckets */
export type BucketName = "unpairedR1" | "unpairedR2" | "pairedR1" | "pairedR2";

/**
 * The four classified and ordered buckets
 *
 * `pairedR1[n]` and `pairedR2[n]` always share an identifier.
 */
export type DetangledReads = { readonly [K in BucketName]: readonly ReadRecord[] };

/** Per-bucket value, used for counts and output paths */
export type BucketMap<T> = { readonly [K in BucketName]: T };

/**
 * Outcome of a successful file-level detangle run
 */
export interface DetangleSummary {
  readonly inputPath: string;
  readonly outputPrefix: string;
  readonly counts: BucketMap<number>;
  readonly outputs: BucketMap<string>;
  readonly totalReads: number;
  readonly r1Reads: number;
  readonly r2Reads: number;
  readonly elapsedMs: number;
}

// =============================================================================
// OPTIONS
// =============================================================================

/** Minimum level written by the pipeline logger */
export type LogLevelName = "all" | "debug" | "info" | "warning" | "error" | "none";

export interface ParserOptions {
  /** Attach 1-based header line numbers to parsed records (default: true) */
  trackLineNumbers?: boolean;
}

export interface DetangleOptions extends ParserOptions {
  /** Minimum log level (default: "info") */
  logLevel?: LogLevelName;
}

// =============================================================================
// ARKTYPE SCHEMAS
// =============================================================================

/**
 * Non-empty path without NUL bytes
 */
export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({
      expected: "a path without null characters",
      actual: JSON.stringify(path),
    });
  }
  return true;
});

/**
 * Output prefix: any non-empty string, same character rules as paths
 */
export const OutputPrefixSchema = FilePathSchema;

export const LogLevelSchema = type("'all'|'debug'|'info'|'warning'|'error'|'none'");

export const DetangleOptionsSchema = type({
  "logLevel?": LogLevelSchema,
  "trackLineNumbers?": "boolean",
});
