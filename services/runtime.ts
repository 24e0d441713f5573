/**
 * EFFECT RUNTIME - CENTRALIZED RUNTIME CONFIGURATION
 *
 * Provides a unified way to run the encoding service programs with:
 * - Consistent structured (JSON line) logging
 * - Result-typed helpers instead of thrown exceptions
 *
 * Architecture:
 * - Effect.runPromise for callers already in async code
 * - Effect.runSync for the (purely synchronous) encoding algebra
 */

import { Effect, Logger } from "effect";
import type { EncodingError } from "./encodingErrors";
import { appLogger, redactRecord, redactValue } from "./appLogger";

// ============================================================================
// RUNTIME CONFIGURATION
// ============================================================================

/**
 * Effect logger in the same JSON format as appLogger
 */
const AppLogger = Logger.make(({ logLevel, message, annotations }) => {
  const timestamp = new Date().toISOString();
  const level = logLevel.label;

  const logEntry = {
    timestamp,
    level,
    message: redactValue(message),
    ...redactRecord(Object.fromEntries(annotations)),
  };

  if (level === "ERROR" || level === "FATAL") {
    console.error(JSON.stringify(logEntry));
  } else if (level === "WARN") {
    console.warn(JSON.stringify(logEntry));
  } else if (level === "INFO") {
    console.info(JSON.stringify(logEntry));
  } else {
    console.log(JSON.stringify(logEntry));
  }
});

const AppLayer = Logger.replace(Logger.defaultLogger, AppLogger);

export type RunResult<A, E> = { success: true; data: A } | { success: false; error: E };

// ============================================================================
// RUNTIME HELPERS
// ============================================================================

/**
 * Run Effect as Promise, failures returned as values
 *
 * @example
 * const result = await runPromise(
 *   findEpisodeInteractions(episodes, adverseEvent).pipe(Effect.provide(EpisodeEncodingServiceLive))
 * );
 * if (result.success) {
 *   console.log(result.data.keys);
 * }
 */
export const runPromise = <A, E>(
  effect: Effect.Effect<A, E, never>
): Promise<RunResult<A, E>> => {
  return Effect.runPromise(
    effect.pipe(
      Effect.provide(AppLayer),
      Effect.map((data) => ({ success: true as const, data })),
      Effect.catchAll((error) =>
        Effect.succeed({ success: false as const, error })
      )
    )
  );
};

/**
 * Run an infallible Effect synchronously
 */
export const runSync = <A>(
  effect: Effect.Effect<A, never, never>
): A => {
  return Effect.runSync(effect.pipe(Effect.provide(AppLayer)));
};

/**
 * Run Effect synchronously with Result type (no exceptions)
 *
 * @example
 * const result = runSyncResult(encodeWindow(window));
 * if (!result.success) appLogger.warn("window_skipped", serializeError(result.error));
 */
export const runSyncResult = <A, E>(
  effect: Effect.Effect<A, E, never>
): RunResult<A, E> => {
  return Effect.runSync(
    effect.pipe(
      Effect.provide(AppLayer),
      Effect.map((data) => ({ success: true as const, data })),
      Effect.catchAll((error) =>
        Effect.succeed({ success: false as const, error })
      )
    )
  );
};

/**
 * Run Effect with start/finish logging and timing
 */
export const runWithLogging = async <A, E>(
  operationName: string,
  effect: Effect.Effect<A, E, never>
): Promise<RunResult<A, E>> => {
  const startTime = Date.now();

  appLogger.info("operation_start", { operation: operationName });

  const result = await runPromise(effect);

  const durationMs = Date.now() - startTime;

  if (result.success) {
    appLogger.info("operation_complete", { operation: operationName, durationMs });
  } else {
    appLogger.error("operation_failed", { operation: operationName, durationMs, error: result.error });
  }

  return result;
};

// ============================================================================
// ERROR HELPERS
// ============================================================================

/**
 * Encoding errors are input-contract violations; never retried
 */
export const isRecoverable = (error: EncodingError): boolean => {
  return error.recoverable;
};

export const serializeError = (error: EncodingError): Record<string, unknown> => {
  return error.toJSON();
};

export { AppLayer, AppLogger };
