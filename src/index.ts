/**
 * fastq-detangle - split interleaved paired-end FASTQ reads
 *
 * Separates R1 and R2 reads into paired and unpaired files, each ordered
 * by read identifier so that paired files line up record for record.
 */

// Error types
export {
  DetangleError,
  DuplicateMateError,
  EmptyInputError,
  FileError,
  type MalformedReason,
  MalformedRecordError,
  ParseError,
  StreamError,
  UnrecognizedMateSuffixError,
  ValidationError,
} from "./errors";
// FASTQ records
export {
  assembleFastqRecord,
  BUCKET_ORDER,
  formatHeader,
  isValidHeader,
  isValidSeparator,
  LINES_PER_RECORD,
  MARKERS,
  OUTPUT_SUFFIXES,
  parseMateSuffix,
  ReadRecordParser,
  ReadRecordWriter,
  type ReadRecordWriterOptions,
} from "./formats/fastq";
// Pipeline
export { detangleFile } from "./detangler";
// I/O
export { type FileMetadata, getMetadata } from "./io/file-reader";
export { commitOutputs, outputPaths, type PendingOutput } from "./io/output-set";
export { readLines, splitLines } from "./io/stream-utils";
// Operations
export {
  classifyRecord,
  compareIdentifiers,
  detangle,
  detangleAsync,
  PairingIndex,
  type ReadonlyPairingIndex,
} from "./operations/detangle";
// Core types
export {
  type BucketMap,
  type BucketName,
  type DetangledReads,
  type DetangleOptions,
  DetangleOptionsSchema,
  type DetangleSummary,
  FilePathSchema,
  type LogLevelName,
  LogLevelSchema,
  Mate,
  type ParserOptions,
  type ReadRecord,
} from "./types";
