/**
 * Tests for strict four-line FASTQ parsing
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  FileError,
  MalformedRecordError,
  UnrecognizedMateSuffixError,
  ValidationError,
} from "../../src/errors";
import { ReadRecordParser } from "../../src/formats/fastq/parser";
import { Mate } from "../../src/types";

function streamOf(...chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected an error");
}

describe("ReadRecordParser", () => {
  const parser = new ReadRecordParser();

  describe("parseString", () => {
    test("parses a single record", () => {
      const records = [...parser.parseString("@a/1\nACGT\n+\nIIII\n")];

      expect(records).toEqual([
        {
          header: "@a/1",
          identifier: "a",
          mate: Mate.First,
          sequence: "ACGT",
          separator: "+",
          quality: "IIII",
          lineNumber: 1,
        },
      ]);
    });

    test("tracks the starting line of each record", () => {
      const data = "@a/1\nAC\n+\nII\n@a/2\nGT\n+\nII\n@b/1\nTT\n+\nII\n";
      const lineNumbers = [...parser.parseString(data)].map((r) => r.lineNumber);

      expect(lineNumbers).toEqual([1, 5, 9]);
    });

    test("omits line numbers when tracking is disabled", () => {
      const untracked = new ReadRecordParser({ trackLineNumbers: false });
      const [record] = [...untracked.parseString("@a/2\nAC\n+\nII")];

      expect(record).toBeDefined();
      expect(record && "lineNumber" in record).toBe(false);
    });

    test("accepts a final record without a trailing newline", () => {
      const records = [...parser.parseString("@a/1\nACGT\n+\nIIII")];
      expect(records).toHaveLength(1);
      expect(records[0]?.quality).toBe("IIII");
    });

    test("yields nothing for an empty string", () => {
      expect([...parser.parseString("")]).toEqual([]);
    });

    test("strips CRLF line endings", () => {
      const [record] = [...parser.parseString("@a/2\r\nAC\r\n+\r\nII\r\n")];

      expect(record?.header).toBe("@a/2");
      expect(record?.sequence).toBe("AC");
      expect(record?.separator).toBe("+");
      expect(record?.quality).toBe("II");
      expect(record?.mate).toBe(Mate.Second);
    });

    test("keeps slashes inside the identifier", () => {
      const [record] = [...parser.parseString("@run:1/x/2\nA\n+\nI\n")];

      expect(record?.identifier).toBe("run:1/x");
      expect(record?.mate).toBe(Mate.Second);
    });

    test("ignores trailing whitespace after the mate suffix", () => {
      const [record] = [...parser.parseString("@a/1  \nA\n+\nI\n")];

      expect(record?.identifier).toBe("a");
      expect(record?.header).toBe("@a/1");
    });

    test("preserves the separator line as read", () => {
      const [record] = [...parser.parseString("@a/1\nA\n+a/1\nI\n")];
      expect(record?.separator).toBe("+a/1");
    });

    test("counts empty lines toward record framing", () => {
      const [record] = [...parser.parseString("@a/1\n\n+\n\n")];

      expect(record?.sequence).toBe("");
      expect(record?.quality).toBe("");
    });

    test("does not validate sequence or quality content", () => {
      const [record] = [...parser.parseString("@a/1\nNN-xyz\n+\n!!\n")];

      expect(record?.sequence).toBe("NN-xyz");
      expect(record?.quality).toBe("!!");
    });
  });

  describe("framing errors", () => {
    test("rejects a truncated final record", () => {
      const error = captureError(() => [...parser.parseString("@a/1\nAC\n+\nII\n@b/1\nAC\n+\n")]);

      expect(error).toBeInstanceOf(MalformedRecordError);
      if (error instanceof MalformedRecordError) {
        expect(error.reason).toBe("truncated");
        expect(error.message).toBe("Incomplete FASTQ record: expected 4 lines, got 3");
        expect(error.lineNumber).toBe(5);
        expect(error.context).toBe("@b/1");
      }
    });

    test("rejects a header without @", () => {
      const error = captureError(() => [...parser.parseString("@a/1\nA\n+\nI\nb/2\nA\n+\nI\n")]);

      expect(error).toBeInstanceOf(MalformedRecordError);
      if (error instanceof MalformedRecordError) {
        expect(error.reason).toBe("header-marker");
        expect(error.lineNumber).toBe(5);
        expect(error.context).toBe("b/2");
      }
    });

    test("rejects a separator without +", () => {
      const error = captureError(() => [...parser.parseString("@a/1\nACGT\n-\nIIII\n")]);

      expect(error).toBeInstanceOf(MalformedRecordError);
      if (error instanceof MalformedRecordError) {
        expect(error.reason).toBe("separator-marker");
        expect(error.message).toBe('FASTQ separator must start with "+"');
        expect(error.lineNumber).toBe(3);
      }
    });

    test("rejects an unrecognized mate suffix", () => {
      const error = captureError(() => [...parser.parseString("@x/3\nA\n+\nI\n")]);

      expect(error).toBeInstanceOf(UnrecognizedMateSuffixError);
      if (error instanceof UnrecognizedMateSuffixError) {
        expect(error.header).toBe("@x/3");
        expect(error.lineNumber).toBe(1);
      }
    });

    test("rejects a space-delimited mate marker", () => {
      expect(() => [...parser.parseString("@x 1:N:0\nA\n+\nI\n")]).toThrow(
        UnrecognizedMateSuffixError
      );
    });

    test("rejects a header with no name before the suffix", () => {
      const error = captureError(() => [...parser.parseString("@/1\nA\n+\nI\n")]);

      expect(error).toBeInstanceOf(MalformedRecordError);
      if (error instanceof MalformedRecordError) {
        expect(error.reason).toBe("empty-name");
      }
    });

    test("yields records before the failure point", () => {
      const seen: string[] = [];
      expect(() => {
        for (const record of parser.parseString("@a/1\nA\n+\nI\n@b/1\nA\n")) {
          seen.push(record.identifier);
        }
      }).toThrow(MalformedRecordError);
      expect(seen).toEqual(["a"]);
    });
  });

  describe("parseLines", () => {
    test("offsets line numbers from the given start", () => {
      const [record] = [...parser.parseLines(["@a/1", "A", "+", "I"], 11)];
      expect(record?.lineNumber).toBe(11);
    });
  });

  describe("parse (stream)", () => {
    test("matches parseString across chunk boundaries", async () => {
      const text = "@a/1\r\nACGT\n+\nIIII\n@a/2\nTTTT\n+a/2\nJJJJ\n";
      const streamed = await collect(
        parser.parse(streamOf("@a/1\r", "\nAC", "GT\n+\nIIII\n@a/2\nTT", "TT\n+a/2\nJJJJ\n"))
      );

      expect(streamed).toEqual([...parser.parseString(text)]);
      expect(streamed.map((r) => r.identifier)).toEqual(["a", "a"]);
    });

    test("rejects a truncated stream", async () => {
      await expect(collect(parser.parse(streamOf("@a/1\nAC\n")))).rejects.toThrow(
        MalformedRecordError
      );
    });
  });

  describe("parseFile", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "fastq-parser-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    test("parses records from disk", async () => {
      const path = join(dir, "reads.fastq");
      writeFileSync(path, "@r1/1\nACGT\n+\nIIII\n@r1/2\nTGCA\n+\nHHHH\n");

      const records = await collect(parser.parseFile(path));

      expect(records.map((r) => [r.identifier, r.mate, r.sequence])).toEqual([
        ["r1", Mate.First, "ACGT"],
        ["r1", Mate.Second, "TGCA"],
      ]);
    });

    test("fails with FileError for a missing file", async () => {
      await expect(collect(parser.parseFile(join(dir, "missing.fastq")))).rejects.toThrow(FileError);
    });

    test("fails with FileError for a directory", async () => {
      await expect(collect(parser.parseFile(dir))).rejects.toThrow(FileError);
    });
  });

  test("rejects invalid options", () => {
    const options = JSON.parse('{"trackLineNumbers":"yes"}');
    expect(() => new ReadRecordParser(options)).toThrow(ValidationError);
  });
});
