/**
 * File writing operations using Effect Platform
 *
 * Promise-based wrappers over the Effect file system. Failures are reported
 * as {@link FileError} naming the path and operation.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import { runPlatform } from "./runtime";

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @throws {FileError} When the write fails
 *
 * @example
 * ```typescript
 * await writeString("out_R1_paired.fastq", "@a/1\nACGT\n+\nIIII\n");
 * ```
 */
export async function writeString(path: string, content: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFileString(path, content);
  });

  try {
    await runPlatform(program, "none");
  } catch (error) {
    throw FileError.fromSystemError("write", path, error);
  }
}

/**
 * Move a file onto a new path, replacing any file already there
 *
 * @throws {FileError} When the rename fails
 */
export async function renameFile(fromPath: string, toPath: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.rename(fromPath, toPath);
  });

  try {
    await runPlatform(program, "none");
  } catch (error) {
    throw FileError.fromSystemError("rename", toPath, error);
  }
}

/**
 * Delete file from filesystem
 *
 * Does not throw if the file doesn't exist.
 *
 * @throws {FileError} When deletion fails for any other reason
 */
export async function deleteFile(path: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (yield* fs.exists(path)) {
      yield* fs.remove(path);
    }
  });

  try {
    await runPlatform(program, "none");
  } catch (error) {
    throw FileError.fromSystemError("remove", path, error);
  }
}
