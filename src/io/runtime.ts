/**
 * Effect platform layer and program runner
 *
 * All file-system work goes through `@effect/platform` services backed by
 * the Node.js layer. Callers see plain Promises; failures surface as the
 * original error object rather than a wrapped fiber failure.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Logger, LogLevel } from "effect";
import type { LogLevelName } from "../types";

/**
 * Platform layer providing FileSystem, Path and related services
 */
export function getPlatform() {
  return NodeContext.layer;
}

const LOG_LEVELS: Record<LogLevelName, LogLevel.LogLevel> = {
  all: LogLevel.All,
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warning: LogLevel.Warning,
  error: LogLevel.Error,
  none: LogLevel.None,
};

/**
 * Map a configured level name onto Effect's log level
 */
export function toLogLevel(name: LogLevelName): LogLevel.LogLevel {
  return LOG_LEVELS[name];
}

/**
 * Default log format, written to stderr so stdout carries only command output
 */
const StderrLogger = Logger.replace(
  Logger.defaultLogger,
  Logger.withConsoleError(Logger.stringLogger)
);

/**
 * Run a program against the platform layer and unwrap its outcome
 *
 * @param program Effect requiring only platform services
 * @param logLevel Minimum level for `Effect.log*` calls inside the program
 * @returns The program's success value
 * @throws The squashed failure cause: the error passed to `Effect.fail`,
 *   or the defect thrown inside `Effect.sync`/`Effect.promise`
 */
export async function runPlatform<A, E>(
  program: Effect.Effect<A, E, NodeContext.NodeContext>,
  logLevel: LogLevelName = "info"
): Promise<A> {
  const exit = await Effect.runPromiseExit(
    program.pipe(
      Logger.withMinimumLogLevel(toLogLevel(logLevel)),
      Effect.provide(StderrLogger),
      Effect.provide(getPlatform())
    )
  );

  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
