/**
 * File-level detangle pipeline
 *
 * Validates the caller's input, parses the interleaved file, classifies
 * and orders the reads, and commits the four output files atomically.
 * Progress is reported through Effect's logger at the configured level.
 *
 * @module detangler
 */

import { type } from "arktype";
import { Effect } from "effect";
import { EmptyInputError, FileError, ValidationError } from "./errors";
import { BUCKET_ORDER } from "./formats/fastq/constants";
import { ReadRecordParser } from "./formats/fastq/parser";
import { ReadRecordWriter } from "./formats/fastq/writer";
import { getMetadata } from "./io/file-reader";
import { commitOutputs, outputPaths, type PendingOutput } from "./io/output-set";
import { runPlatform } from "./io/runtime";
import { detangleAsync } from "./operations/detangle";
import type {
  BucketMap,
  DetangledReads,
  DetangleOptions,
  DetangleSummary,
} from "./types";
import { DetangleOptionsSchema, FilePathSchema, OutputPrefixSchema } from "./types";

const BUCKET_LABELS: BucketMap<string> = {
  unpairedR1: "R1 reads with missing pairs",
  unpairedR2: "R2 reads with missing pairs",
  pairedR1: "Paired R1 reads",
  pairedR2: "Paired R2 reads",
};

function validateOptions(options: DetangleOptions): Required<DetangleOptions> {
  const result = DetangleOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid detangle options: ${result.summary}`);
  }
  return {
    logLevel: options.logLevel ?? "info",
    trackLineNumbers: options.trackLineNumbers ?? true,
  };
}

function validateArgument(
  schema: typeof FilePathSchema,
  value: string,
  label: string
): string {
  const result = schema(value);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid ${label}: ${result.summary}`, undefined, value);
  }
  return result;
}

function countsOf(reads: DetangledReads): BucketMap<number> {
  return {
    unpairedR1: reads.unpairedR1.length,
    unpairedR2: reads.unpairedR2.length,
    pairedR1: reads.pairedR1.length,
    pairedR2: reads.pairedR2.length,
  };
}

const seconds = (ms: number): string => (ms / 1000).toFixed(2);

/**
 * Detangle an interleaved FASTQ file into four ordered output files
 *
 * Outputs are named `{outputPrefix}_R1_ordered_with_missing_R2.fastq`,
 * `{outputPrefix}_R2_ordered_with_missing_R1.fastq`,
 * `{outputPrefix}_R1_paired.fastq` and `{outputPrefix}_R2_paired.fastq`.
 * Either all four are written or none are.
 *
 * @param inputPath - Interleaved FASTQ file
 * @param outputPrefix - Prefix for the output file names, may include directories
 * @param options - Logging and parsing options
 * @returns Per-bucket counts, output paths and timing
 * @throws {ValidationError} When options, paths or the input file are unusable
 * @throws {FileError} When the input cannot be read or an output cannot be written
 * @throws {MalformedRecordError} When FASTQ framing is violated
 * @throws {UnrecognizedMateSuffixError} When a header lacks a `/1` or `/2` suffix
 * @throws {DuplicateMateError} When an identifier has the same mate twice
 *
 * @example
 * ```typescript
 * const summary = await detangleFile("interleaved.fastq", "out/sample");
 * console.log(summary.counts.pairedR1, "pairs");
 * ```
 */
export async function detangleFile(
  inputPath: string,
  outputPrefix: string,
  options: DetangleOptions = {}
): Promise<DetangleSummary> {
  const { logLevel, trackLineNumbers } = validateOptions(options);
  const input = validateArgument(FilePathSchema, inputPath, "input path");
  const prefix = validateArgument(OutputPrefixSchema, outputPrefix, "output prefix");

  const parser = new ReadRecordParser({ trackLineNumbers });
  const writer = new ReadRecordWriter();
  const paths = outputPaths(prefix);

  const program = Effect.gen(function* () {
    const startTime = Date.now();
    yield* Effect.logInfo("Starting FASTQ detangling");
    yield* Effect.logInfo(`Input file: ${input}`);
    yield* Effect.logInfo(`Output prefix: ${prefix}`);

    const metadata = yield* Effect.tryPromise({
      try: () => getMetadata(input),
      catch: (error) => error,
    });
    if (!metadata.isFile) {
      return yield* Effect.fail(
        new FileError(`Input path is not a file: ${input}`, input, "read")
      );
    }
    if (metadata.size === 0) {
      return yield* Effect.fail(new EmptyInputError(input));
    }
    yield* Effect.logInfo(`Input file size: ${metadata.size.toLocaleString("en-US")} bytes`);

    const parseStart = Date.now();
    yield* Effect.logInfo("Parsing and indexing reads...");
    const reads = yield* Effect.tryPromise({
      try: () => detangleAsync(parser.parseFile(input)),
      catch: (error) => error,
    });
    const counts = countsOf(reads);
    const r1Reads = counts.unpairedR1 + counts.pairedR1;
    const r2Reads = counts.unpairedR2 + counts.pairedR2;

    yield* Effect.logInfo(`Parsing and analysis completed in ${seconds(Date.now() - parseStart)} seconds`);
    yield* Effect.logInfo(`Total R1 reads found: ${r1Reads.toLocaleString("en-US")}`);
    yield* Effect.logInfo(`Total R2 reads found: ${r2Reads.toLocaleString("en-US")}`);
    for (const bucket of BUCKET_ORDER) {
      yield* Effect.logInfo(`${BUCKET_LABELS[bucket]}: ${counts[bucket].toLocaleString("en-US")}`);
    }

    const writeStart = Date.now();
    yield* Effect.logInfo("Writing output files...");
    const pending: BucketMap<PendingOutput> = {
      unpairedR1: { path: paths.unpairedR1, content: writer.formatRecords(reads.unpairedR1) },
      unpairedR2: { path: paths.unpairedR2, content: writer.formatRecords(reads.unpairedR2) },
      pairedR1: { path: paths.pairedR1, content: writer.formatRecords(reads.pairedR1) },
      pairedR2: { path: paths.pairedR2, content: writer.formatRecords(reads.pairedR2) },
    };
    for (const bucket of BUCKET_ORDER) {
      yield* Effect.logDebug(`Formatted ${bucket}: ${pending[bucket].content.length} characters`);
    }
    yield* Effect.tryPromise({
      try: () => commitOutputs(pending),
      catch: (error) => error,
    });

    for (const bucket of BUCKET_ORDER) {
      yield* Effect.logInfo(`Written: ${paths[bucket]} (${counts[bucket].toLocaleString("en-US")} reads)`);
      if (counts[bucket] === 0) {
        yield* Effect.logWarning(`Output file is empty: ${paths[bucket]}`);
      }
    }

    const elapsedMs = Date.now() - startTime;
    yield* Effect.logInfo(`File writing completed in ${seconds(Date.now() - writeStart)} seconds`);
    yield* Effect.logInfo(`Total processing time: ${seconds(elapsedMs)} seconds`);
    yield* Effect.logInfo("FASTQ detangling completed successfully");

    const summary: DetangleSummary = {
      inputPath: input,
      outputPrefix: prefix,
      counts,
      outputs: paths,
      totalReads: r1Reads + r2Reads,
      r1Reads,
      r2Reads,
      elapsedMs,
    };
    return summary;
  });

  return runPlatform(
    program.pipe(
      Effect.tapError((error) =>
        Effect.logError(`Detangling failed: ${error instanceof Error ? error.message : String(error)}`)
      ),
      Effect.withLogSpan("detangle"),
      Effect.annotateLogs("input", input)
    ),
    logLevel
  );
}
