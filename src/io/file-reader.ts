/**
 * File reading utilities built on the Effect platform file system
 *
 * Effect handles the platform details; every function here hides it behind
 * a Promise and reports failures as {@link FileError}.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Stream } from "effect";
import { FileError } from "../errors";
import { FilePathSchema } from "../types";
import { runPlatform } from "./runtime";

/**
 * What the pipeline needs to know about an input file before reading it
 */
export interface FileMetadata {
  path: string;
  size: number;
  isFile: boolean;
}

/**
 * Get size and kind of a path
 *
 * @throws {FileError} If the path does not exist or cannot be inspected
 */
export async function getMetadata(path: string): Promise<FileMetadata> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);

    return {
      path: validatedPath,
      size: Number(info.size),
      isFile: info.type === "File",
    };
  });

  try {
    return await runPlatform(program, "none");
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Open a file as a byte stream
 *
 * @param path File path to read
 * @param chunkSize Read chunk size in bytes
 * @throws {FileError} If the path is not a readable regular file
 */
export async function createStream(
  path: string,
  chunkSize = 65536
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const metadata = await getMetadata(validatedPath);
  if (!metadata.isFile) {
    throw new FileError(`Input path is not a file: ${validatedPath}`, validatedPath, "read");
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const effectStream = fs.stream(validatedPath, { chunkSize });
    return Stream.toReadableStream(effectStream);
  });

  try {
    return await runPlatform(program, "none");
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }
}

/**
 * Validate a file path with ArkType
 *
 * @throws {FileError} If the path is empty or contains NUL bytes
 */
export function validatePath(path: string): string {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}
