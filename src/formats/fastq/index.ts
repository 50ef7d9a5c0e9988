/**
 * FASTQ record format: parsing, primitives and writing
 */

export { BUCKET_ORDER, LINES_PER_RECORD, MARKERS, OUTPUT_SUFFIXES } from "./constants";
export { ReadRecordParser } from "./parser";
export {
  assembleFastqRecord,
  formatHeader,
  isValidHeader,
  isValidSeparator,
  parseMateSuffix,
} from "./primitives";
export { ReadRecordWriter } from "./writer";
export type { ReadRecordWriterOptions } from "./writer";
