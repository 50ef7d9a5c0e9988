/**
 * Tests for file inspection and reading
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { createStream, getMetadata, validatePath } from "../../src/io/file-reader";
import { readLines } from "../../src/io/stream-utils";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "file-io-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("file reader", () => {
  test("reports size and kind", async () => {
    const path = join(dir, "reads.fastq");
    writeFileSync(path, "@a/1\n");

    expect(await getMetadata(path)).toEqual({ path, size: 5, isFile: true });
    expect((await getMetadata(dir)).isFile).toBe(false);
  });

  test("getMetadata fails with a stat FileError for a missing path", async () => {
    const error = await getMetadata(join(dir, "absent")).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FileError);
    if (error instanceof FileError) {
      expect(error.operation).toBe("stat");
    }
  });

  test("streams file contents as lines", async () => {
    const path = join(dir, "reads.fastq");
    writeFileSync(path, "@a/1\nACGT\n+\nIIII\n");

    const lines: string[] = [];
    for await (const line of readLines(await createStream(path, 3))) {
      lines.push(line);
    }

    expect(lines).toEqual(["@a/1", "ACGT", "+", "IIII"]);
  });

  test("validatePath rejects NUL bytes", () => {
    expect(() => validatePath("bad\0path")).toThrow(FileError);
    expect(validatePath("ok.fastq")).toBe("ok.fastq");
  });
});
