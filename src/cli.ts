#!/usr/bin/env tsx
/**
 * fastq-detangle command line
 *
 * Usage: fastq-detangle <input.fastq> <output_prefix> [--log-level <level>]
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { type } from "arktype";
import { detangleFile } from "./detangler";
import { DetangleError } from "./errors";
import { BUCKET_ORDER } from "./formats/fastq/constants";
import { LogLevelSchema } from "./types";

const USAGE = `Usage: fastq-detangle <input.fastq> <output_prefix> [options]

Split an interleaved FASTQ file into paired and unpaired R1/R2 files,
each sorted by read identifier.

Options:
  --log-level <level>  all | debug | info | warning | error | none (default: info)
  -h, --help           Show this help`;

function describeError(error: unknown): string {
  if (error instanceof DetangleError) {
    return error.context === undefined
      ? `Error: ${error.message}`
      : `Error: ${error.message}\n  Context: ${error.context}`;
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      "log-level": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
}

/**
 * Run the command line and resolve to the process exit code
 */
export async function main(argv: string[]): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    console.error(describeError(error));
    console.error(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  if (values.help === true) {
    console.log(USAGE);
    return 0;
  }

  const [inputPath, outputPrefix] = positionals;
  if (positionals.length !== 2 || inputPath === undefined || outputPrefix === undefined) {
    console.error(USAGE);
    return 2;
  }

  const logLevel = LogLevelSchema(values["log-level"] ?? "info");
  if (logLevel instanceof type.errors) {
    console.error(`Error: Invalid --log-level: ${logLevel.summary}`);
    console.error(USAGE);
    return 2;
  }

  try {
    const summary = await detangleFile(inputPath, outputPrefix, { logLevel });
    console.log("Created files:");
    for (const bucket of BUCKET_ORDER) {
      console.log(`  ${summary.outputs[bucket]}`);
    }
    return 0;
  } catch (error) {
    console.error(describeError(error));
    return 1;
  }
}

/**
 * Whether the module at `moduleUrl` is the script Node was started with
 *
 * Both sides are resolved through symlinks, so a `bin` link installed by
 * npm counts as running this file.
 */
export function isDirectRun(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (scriptPath === undefined) return false;
  try {
    return realpathSync(fileURLToPath(moduleUrl)) === realpathSync(scriptPath);
  } catch {
    return false;
  }
}

if (isDirectRun(import.meta.url, process.argv[1])) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(describeError(error));
      process.exitCode = 1;
    }
  );
}
