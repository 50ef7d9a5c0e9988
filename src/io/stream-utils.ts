/**
 * Stream processing utilities for line-oriented text
 *
 * Turns a byte stream into complete lines, buffering partial lines across
 * chunk boundaries. Line splitting matches {@link splitLines} exactly, so
 * parsing a file and parsing its contents as a string see the same lines.
 */

import { StreamError } from "../errors";

/** Result of splitting a text buffer into complete lines */
export interface LineProcessingResult {
  lines: string[];
  /** Trailing text after the last newline, carried into the next chunk */
  remainder: string;
}

/**
 * Split a complete text into lines
 *
 * Lines end at `\n`, with an optional preceding `\r` removed. The empty
 * string after a final newline is not a line; every other empty line is.
 *
 * @example
 * ```typescript
 * splitLines("@a/1\nACGT\n+\nIIII\n"); // ["@a/1", "ACGT", "+", "IIII"]
 * splitLines("x\r\n\r\ny");            // ["x", "", "y"]
 * ```
 */
export function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Extract complete lines from a buffer, keeping the unterminated tail
 *
 * A trailing `\r` stays in the remainder, since its `\n` may arrive with
 * the next chunk.
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lastNewline = buffer.lastIndexOf("\n");
  if (lastNewline === -1) {
    return { lines: [], remainder: buffer };
  }

  const lines = buffer.slice(0, lastNewline).split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line !== undefined && line.endsWith("\r")) {
      lines[i] = line.slice(0, -1);
    }
  }

  return { lines, remainder: buffer.slice(lastNewline + 1) };
}

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * @param stream Stream of UTF-8 encoded text
 * @yields Complete lines without their line terminators
 * @throws {StreamError} If reading or decoding the stream fails
 * @example
 * ```typescript
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith("@")) console.log("header:", line);
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8", { fatal: true });
  let buffer = "";
  let totalBytesProcessed = 0;
  // Set once the stream has closed or errored; otherwise it must be cancelled
  let settled = false;

  try {
    while (true) {
      let result: { done: boolean; value?: Uint8Array };
      try {
        result = await reader.read();
      } catch (error) {
        settled = true;
        throw streamFailure("Line reading failed", error, totalBytesProcessed);
      }

      if (result.done || result.value === undefined) {
        settled = true;
        buffer += decode(decoder, undefined, totalBytesProcessed);
        if (buffer.length > 0) {
          yield buffer;
        }
        break;
      }

      const text = decode(decoder, result.value, totalBytesProcessed);
      totalBytesProcessed += result.value.length;
      const lines = processBuffer(buffer + text);
      buffer = lines.remainder;
      yield* lines.lines;
    }
  } finally {
    // Consumer stopped early or decoding failed: close the underlying file
    if (!settled) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

function decode(decoder: TextDecoder, chunk: Uint8Array | undefined, bytesSoFar: number): string {
  try {
    return chunk === undefined ? decoder.decode() : decoder.decode(chunk, { stream: true });
  } catch (error) {
    throw streamFailure("Invalid UTF-8 in input", error, bytesSoFar);
  }
}

function streamFailure(message: string, error: unknown, bytesSoFar: number): StreamError {
  return new StreamError(
    `${message}: ${error instanceof Error ? error.message : String(error)}`,
    bytesSoFar
  );
}
