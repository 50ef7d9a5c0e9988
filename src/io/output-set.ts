/**
 * All-or-nothing commit of the four output files
 *
 * Every bucket is first written to a temporary sibling of its final path.
 * Only when all four writes succeed are they renamed into place. Any
 * failure removes what this commit created, so a failed run leaves no
 * output files behind.
 */

import { randomUUID } from "node:crypto";
import { BUCKET_ORDER, OUTPUT_SUFFIXES } from "../formats/fastq/constants";
import type { BucketMap } from "../types";
import { deleteFile, renameFile, writeString } from "./file-writer";

/**
 * Final output path of every bucket for a prefix
 *
 * @example
 * ```typescript
 * outputPaths("out/sample").pairedR1; // "out/sample_R1_paired.fastq"
 * ```
 */
export function outputPaths(prefix: string): BucketMap<string> {
  return {
    unpairedR1: `${prefix}${OUTPUT_SUFFIXES.unpairedR1}`,
    unpairedR2: `${prefix}${OUTPUT_SUFFIXES.unpairedR2}`,
    pairedR1: `${prefix}${OUTPUT_SUFFIXES.pairedR1}`,
    pairedR2: `${prefix}${OUTPUT_SUFFIXES.pairedR2}`,
  };
}

/** One file to produce: its final path and full contents */
export interface PendingOutput {
  readonly path: string;
  readonly content: string;
}

function temporaryPath(finalPath: string): string {
  return `${finalPath}.${randomUUID().slice(0, 8)}.tmp`;
}

/**
 * Remove files, attempting every path even when some removals fail
 *
 * @returns Paths that could not be removed
 */
async function removeAll(paths: readonly string[]): Promise<string[]> {
  const results = await Promise.allSettled(paths.map((path) => deleteFile(path)));
  return paths.filter((_, i) => results[i]?.status === "rejected");
}

/**
 * Clean up after a failed commit and rethrow the original failure
 */
async function abort(error: unknown, paths: readonly string[]): Promise<never> {
  const leftover = await removeAll(paths);
  if (leftover.length > 0 && error instanceof Error) {
    error.message += ` (cleanup also failed for: ${leftover.join(", ")})`;
  }
  throw error;
}

/**
 * Write all outputs, or none
 *
 * @param outputs - Content for each bucket
 * @returns Final paths, in bucket order
 * @throws {FileError} From the first failed write or rename, after cleanup
 */
export async function commitOutputs(outputs: BucketMap<PendingOutput>): Promise<string[]> {
  const staged: Array<{ temp: string; final: string }> = [];

  try {
    for (const bucket of BUCKET_ORDER) {
      const { path, content } = outputs[bucket];
      const temp = temporaryPath(path);
      staged.push({ temp, final: path });
      await writeString(temp, content);
    }
  } catch (error) {
    return abort(error, staged.map((entry) => entry.temp));
  }

  let renamed = 0;
  try {
    for (const entry of staged) {
      await renameFile(entry.temp, entry.final);
      renamed++;
    }
  } catch (error) {
    return abort(error, [
      ...staged.slice(0, renamed).map((entry) => entry.final),
      ...staged.slice(renamed).map((entry) => entry.temp),
    ]);
  }

  return staged.map((entry) => entry.final);
}
