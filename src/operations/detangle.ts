/**
 * Detangle operation - split interleaved reads into paired and unpaired buckets
 *
 * Classification needs to know, for every read, whether its mate appears
 * anywhere in the input. All records are therefore buffered in one pass
 * while the pairing index is built, then classified and sorted.
 *
 * **Algorithm:**
 * 1. Index pass: buffer each record, add (identifier, mate) to the index
 * 2. Classification: route each record by whether the opposite mate exists
 * 3. Ordering: sort every bucket by identifier, plain code-point order
 *
 * Sorting both paired buckets by identifier makes `pairedR1[n]` and
 * `pairedR2[n]` mates for every `n`.
 *
 * **Memory Usage:** O(n) - every record and index entry is held until the
 * call returns.
 *
 * @module operations/detangle
 */

import { DuplicateMateError } from "../errors";
import type { BucketName, DetangledReads, ReadRecord } from "../types";
import { Mate } from "../types";

/**
 * Total order used for every output bucket
 *
 * Compares Unicode code points, which matches UTF-8 byte order; no locale
 * or numeric collation, so `"read10"` sorts before `"read2"`.
 */
export function compareIdentifiers(a: string, b: string): number {
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(j) ?? 0;
    if (ca !== cb) return ca < cb ? -1 : 1;
    // Astral characters span two code units
    i += ca > 0xffff ? 2 : 1;
    j += cb > 0xffff ? 2 : 1;
  }
  if (i < a.length) return 1;
  if (j < b.length) return -1;
  return 0;
}

/**
 * Read-only view of which mates were observed per identifier
 */
export interface ReadonlyPairingIndex {
  hasMate(identifier: string, mate: Mate): boolean;
  readonly size: number;
}

/**
 * Mapping from identifier to the set of mate numbers seen for it
 *
 * Each (identifier, mate) pair may be added once; a second add is a
 * conflict and throws instead of overwriting.
 */
export class PairingIndex implements ReadonlyPairingIndex {
  private readonly mates = new Map<string, Set<Mate>>();

  /**
   * Record that a mate exists for an identifier
   *
   * @param record - Record being indexed
   * @param recordIndex - 0-based position of the record in the input
   * @throws {DuplicateMateError} When this mate was already seen for the identifier
   */
  add(record: ReadRecord, recordIndex: number): void {
    const seen = this.mates.get(record.identifier);

    if (seen === undefined) {
      this.mates.set(record.identifier, new Set([record.mate]));
      return;
    }

    if (seen.has(record.mate)) {
      throw new DuplicateMateError(record.identifier, record.mate, recordIndex, record.lineNumber);
    }
    seen.add(record.mate);
  }

  hasMate(identifier: string, mate: Mate): boolean {
    return this.mates.get(identifier)?.has(mate) ?? false;
  }

  /** Number of distinct identifiers */
  get size(): number {
    return this.mates.size;
  }
}

function oppositeMate(mate: Mate): Mate {
  return mate === Mate.First ? Mate.Second : Mate.First;
}

/**
 * Bucket a record belongs to, given the completed index
 */
export function classifyRecord(record: ReadRecord, index: ReadonlyPairingIndex): BucketName {
  const paired = index.hasMate(record.identifier, oppositeMate(record.mate));

  if (record.mate === Mate.First) {
    return paired ? "pairedR1" : "unpairedR1";
  }
  return paired ? "pairedR2" : "unpairedR2";
}

/**
 * Buffers records and builds the pairing index as they arrive
 *
 * Shared by the synchronous and streaming entry points; a collector is
 * used for exactly one detangle call.
 */
class ReadCollector {
  private readonly records: ReadRecord[] = [];
  private readonly index = new PairingIndex();

  push(record: ReadRecord): void {
    this.index.add(record, this.records.length);
    this.records.push(record);
  }

  finish(): DetangledReads {
    const buckets: Record<BucketName, ReadRecord[]> = {
      unpairedR1: [],
      unpairedR2: [],
      pairedR1: [],
      pairedR2: [],
    };

    for (const record of this.records) {
      buckets[classifyRecord(record, this.index)].push(record);
    }

    // Array.prototype.sort is stable; identifiers within a bucket are unique
    const byIdentifier = (a: ReadRecord, b: ReadRecord): number =>
      compareIdentifiers(a.identifier, b.identifier);

    return {
      unpairedR1: buckets.unpairedR1.sort(byIdentifier),
      unpairedR2: buckets.unpairedR2.sort(byIdentifier),
      pairedR1: buckets.pairedR1.sort(byIdentifier),
      pairedR2: buckets.pairedR2.sort(byIdentifier),
    };
  }
}

/**
 * Classify and order reads into the four output buckets
 *
 * Pure: the input is consumed once and never mutated, and no state
 * survives the call.
 *
 * @param records - Parsed reads in input order
 * @returns Four buckets sorted by identifier
 * @throws {DuplicateMateError} When an identifier has the same mate twice
 *
 * @example
 * ```typescript
 * const parser = new ReadRecordParser();
 * const reads = detangle(parser.parseString(text));
 * reads.pairedR1.length === reads.pairedR2.length; // always true
 * ```
 */
export function detangle(records: Iterable<ReadRecord>): DetangledReads {
  const collector = new ReadCollector();
  for (const record of records) {
    collector.push(record);
  }
  return collector.finish();
}

/**
 * Streaming counterpart of {@link detangle}
 *
 * Parse errors raised by the source propagate unchanged.
 */
export async function detangleAsync(source: AsyncIterable<ReadRecord>): Promise<DetangledReads> {
  const collector = new ReadCollector();
  for await (const record of source) {
    collector.push(record);
  }
  return collector.finish();
}
