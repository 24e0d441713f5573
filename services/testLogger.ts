/**
 * STRUCTURED TEST LOGGER
 *
 * Same JSON line structure as appLogger, gated by VITEST_VERBOSE / DEBUG so
 * that test output stays clean. Only counts and timings are logged, never
 * episode labels.
 */

interface LogMetadata {
  [key: string]: string | number | boolean | undefined;
}

interface PerfMetrics {
  durationMs: number;
  elementCount?: number;
  width?: number;
  pairCount?: number;
}

const isVerbose = process.env.VITEST_VERBOSE === 'true' || process.env.DEBUG === 'true';

const write = (level: string, event: string, fields: object) => {
  console.log(JSON.stringify({
    level,
    event,
    timestamp: new Date().toISOString(),
    ...fields
  }));
};

export const testLogger = {
  /**
   * Log test metadata (verbose only)
   */
  info(event: string, metadata: LogMetadata = {}) {
    if (isVerbose) write('info', event, metadata);
  },

  /**
   * Log timing of the heavier algebra runs (verbose only)
   */
  perf(event: string, metrics: PerfMetrics) {
    if (isVerbose) write('perf', event, metrics);
  },

  /**
   * Log test warnings (always shown)
   */
  warn(event: string, metadata: LogMetadata = {}) {
    write('warn', event, metadata);
  }
};

/**
 * Usage in tests:
 *
 * ```typescript
 * testLogger.perf('test:intersection-large', {
 *   durationMs: 42,
 *   elementCount: 200,
 *   width: 64
 * });
 * ```
 *
 * Run with verbose logging:
 * ```bash
 * VITEST_VERBOSE=true npm test
 * ```
 */
