/**
 * Constants for FASTQ record framing and detangle output naming
 */

// ============================================================================
// RECORD FRAMING
// ============================================================================

/** Lines per FASTQ record: header, sequence, separator, quality */
export const LINES_PER_RECORD = 4;

export const MARKERS = {
  /** First character of every header line */
  HEADER: "@",
  /** First character of every separator line */
  SEPARATOR: "+",
  /** Delimiter between read name and mate number */
  MATE_DELIMITER: "/",
} as const;

/**
 * Literal mate suffix at the end of a header (after trailing whitespace is
 * removed). Capture group 1 is the read name, group 2 the mate number.
 */
export const MATE_SUFFIX_PATTERN = /^(.*)\/([12])$/;

// ============================================================================
// OUTPUT NAMING
// ============================================================================

/**
 * Suffix appended to the caller's prefix for each output bucket
 */
export const OUTPUT_SUFFIXES = {
  unpairedR1: "_R1_ordered_with_missing_R2.fastq",
  unpairedR2: "_R2_ordered_with_missing_R1.fastq",
  pairedR1: "_R1_paired.fastq",
  pairedR2: "_R2_paired.fastq",
} as const;

/** Order in which buckets are written, logged and reported */
export const BUCKET_ORDER = ["unpairedR1", "unpairedR2", "pairedR1", "pairedR2"] as const;
