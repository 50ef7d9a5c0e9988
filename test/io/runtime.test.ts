/**
 * Tests for the platform program runner
 */

import { Effect } from "effect";
import { afterEach, describe, expect, test, vi } from "vitest";
import { ValidationError } from "../../src/errors";
import { runPlatform, toLogLevel } from "../../src/io/runtime";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("runPlatform", () => {
  test("resolves with the program's value", async () => {
    expect(await runPlatform(Effect.succeed(42), "none")).toBe(42);
  });

  test("rethrows the original failure", async () => {
    const failure = new ValidationError("bad input");
    await expect(runPlatform(Effect.fail(failure), "none")).rejects.toBe(failure);
  });

  test("writes log lines to stderr, not stdout", async () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => {});
    const err = vi.spyOn(console, "error").mockImplementation(() => {});

    await runPlatform(Effect.logInfo("indexing reads"), "info");

    expect(out).not.toHaveBeenCalled();
    expect(err).toHaveBeenCalledTimes(1);
    expect(String(err.mock.calls[0]?.[0])).toContain("indexing reads");
  });

  test("drops lines below the minimum level", async () => {
    const err = vi.spyOn(console, "error").mockImplementation(() => {});

    await runPlatform(Effect.logDebug("hidden"), "info");

    expect(err).not.toHaveBeenCalled();
  });
});

describe("toLogLevel", () => {
  test("maps level names onto Effect levels", () => {
    expect(toLogLevel("warning")._tag).toBe("Warning");
    expect(toLogLevel("none")._tag).toBe("None");
  });
});
