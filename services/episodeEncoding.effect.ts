/**
 * EPISODE ENCODING SERVICE - EFFECT-TS VERSION
 *
 * Effect front door to the bitwise encoding algebra.
 *
 * Architecture:
 * - Effect<Result, EncodingError, never> (pure computation, no external deps)
 * - Unknown inputs (timelines loaded from storage, weights matrices) are
 *   decoded with Effect Schema before they reach the core
 * - Errors thrown by the synchronous core become typed failures
 *
 * Flow for an adverse event analysis:
 * 1. encodeEpisodes() - one encoding per medication episode
 * 2. intersection() - pairwise post-expanded co-occurrence
 * 3. getIntersectionSummary() - plain summary for reporting
 */

import { Context, Effect, Layer, pipe, Schema as S } from "effect";
import {
  type EncodingConfig,
  EncodingConfigSchema,
  EpisodeListSchema,
  type IntersectionResult,
  PartialEncodingConfigSchema,
  TimeWindowSchema,
  WeightsMatrixSchema,
  resolveEncodingConfig,
} from "../schemas/episodeEncoding";
import { appLogger } from "./appLogger";
import type { EncodingCollection, IntersectionLabels } from "./encodingCollection";
import {
  type EncodingError,
  EncodingValidationError,
  IncompatibleOperandsError,
  isEncodingError,
} from "./encodingErrors";
import { EpisodeEncoding, popCount } from "./episodeEncoding";
import { type EncodedEpisodes, encodeEpisodes } from "./episodeTimeline";

// ============================================================================
// DECODING HELPERS
// ============================================================================

const decodeInput = <A, I>(schema: S.Schema<A, I, never>, field: string) =>
  (input: unknown): Effect.Effect<A, EncodingValidationError, never> =>
    pipe(
      S.decodeUnknown(schema)(input),
      Effect.mapError(
        (parseError) => new EncodingValidationError({ field, issue: parseError.message })
      )
    );

const decodeConfig = (
  overrides: unknown
): Effect.Effect<EncodingConfig, EncodingValidationError, never> =>
  pipe(
    decodeInput(PartialEncodingConfigSchema, "config")(overrides ?? {}),
    Effect.map(resolveEncodingConfig),
    Effect.flatMap(decodeInput(EncodingConfigSchema, "config"))
  );

/**
 * Lift a synchronous core call; anything it throws that is not an
 * encoding error is a defect, not a typed failure.
 */
const fromCore = <A>(thunk: () => A): Effect.Effect<A, EncodingError, never> =>
  Effect.try({
    try: thunk,
    catch: (error) => error,
  }).pipe(
    Effect.catchAll((error) =>
      isEncodingError(error) ? Effect.fail(error) : Effect.die(error)
    )
  );

// ============================================================================
// SERVICE INTERFACE
// ============================================================================

export interface IntersectionOptions extends IntersectionLabels {
  readonly extraBits?: number;
}

export interface EpisodeEncodingService {
  /**
   * Encode one time window (start/end/referenceTime, Dates or ISO strings)
   */
  readonly encodeWindow: (
    window: unknown,
    config?: Partial<EncodingConfig>
  ) => Effect.Effect<EpisodeEncoding, EncodingError, never>;

  /**
   * Co-occurrence of two post-expanded encodings
   */
  readonly interaction: (
    left: EpisodeEncoding,
    right: EpisodeEncoding,
    extraBits?: number
  ) => Effect.Effect<EpisodeEncoding, IncompatibleOperandsError, never>;

  /**
   * Map a collection through a weights matrix (weights[target][source])
   */
  readonly transform: (
    collection: EncodingCollection,
    weights: unknown
  ) => Effect.Effect<EpisodeEncoding[], EncodingError, never>;

  /**
   * Pairwise interaction search between two collections
   */
  readonly intersection: (
    left: EncodingCollection,
    right: EncodingCollection,
    options?: IntersectionOptions
  ) => Effect.Effect<IntersectionResult, EncodingError, never>;

  /**
   * Encode labelled episodes against a reference event
   */
  readonly encodeEpisodes: (
    episodes: unknown,
    referenceTime: Date,
    config?: Partial<EncodingConfig>
  ) => Effect.Effect<EncodedEpisodes, EncodingError, never>;

  /**
   * Full pipeline: encode episodes, then intersect them with each other
   */
  readonly findEpisodeInteractions: (
    episodes: unknown,
    referenceTime: Date,
    config?: Partial<EncodingConfig>
  ) => Effect.Effect<IntersectionResult, EncodingError, never>;
}

export const EpisodeEncodingService =
  Context.GenericTag<EpisodeEncodingService>("EpisodeEncodingService");

// ============================================================================
// SERVICE IMPLEMENTATION
// ============================================================================

class EpisodeEncodingServiceImpl implements EpisodeEncodingService {
  readonly encodeWindow = (window: unknown, config?: Partial<EncodingConfig>) =>
    Effect.gen(function* (_) {
      const resolved = yield* _(decodeConfig(config));
      const decoded = yield* _(decodeInput(TimeWindowSchema, "timeWindow")(window));
      return yield* _(
        fromCore(() =>
          EpisodeEncoding.fromTimeWindow(decoded, {
            step: resolved.step,
            bitCount: resolved.bitCount,
          })
        )
      );
    });

  readonly interaction = (left: EpisodeEncoding, right: EpisodeEncoding, extraBits = 0) =>
    Effect.try({
      try: () => EpisodeEncoding.interaction(left, right, extraBits),
      catch: (error) => error,
    }).pipe(
      Effect.catchAll((error) =>
        error instanceof IncompatibleOperandsError ? Effect.fail(error) : Effect.die(error)
      )
    );

  readonly transform = (collection: EncodingCollection, weights: unknown) =>
    Effect.gen(function* (_) {
      const matrix = yield* _(decodeInput(WeightsMatrixSchema, "weights")(weights));
      appLogger.debug("encoding_transform_start", {
        sourceCount: collection.elementCount(),
        targetCount: matrix.length,
      });
      return yield* _(fromCore(() => collection.transform(matrix)));
    });

  readonly intersection = (
    left: EncodingCollection,
    right: EncodingCollection,
    options: IntersectionOptions = {}
  ) =>
    Effect.gen(function* (_) {
      const startTime = performance.now();
      const { extraBits = 0, labelsSelf, labelsOther } = options;

      appLogger.info("encoding_intersection_start", {
        elementCount: left.elementCount(),
        extraBits,
        labelled: labelsSelf !== undefined && labelsOther !== undefined,
      });

      const result = yield* _(
        fromCore(() => left.intersection(right, extraBits, { labelsSelf, labelsOther }))
      );

      appLogger.info("encoding_intersection_complete", {
        pairCount: result.keys.size,
        processingTimeMs: Math.round(performance.now() - startTime),
      });
      return result;
    });

  readonly encodeEpisodes = (
    episodes: unknown,
    referenceTime: Date,
    config?: Partial<EncodingConfig>
  ) =>
    Effect.gen(function* (_) {
      const resolved = yield* _(decodeConfig(config));
      const decoded = yield* _(decodeInput(EpisodeListSchema, "episodes")(episodes));
      appLogger.debug("episode_encoding_start", {
        episodeCount: decoded.length,
        bitCount: resolved.bitCount,
      });
      return yield* _(fromCore(() => encodeEpisodes(decoded, referenceTime, resolved)));
    });

  readonly findEpisodeInteractions = (
    episodes: unknown,
    referenceTime: Date,
    config?: Partial<EncodingConfig>
  ) =>
    Effect.gen(this, function* (_) {
      const resolved = yield* _(decodeConfig(config));
      const encoded = yield* _(this.encodeEpisodes(episodes, referenceTime, resolved));
      return yield* _(
        this.intersection(encoded.collection, encoded.collection, {
          extraBits: resolved.postExpandBits,
          labelsSelf: encoded.labels,
          labelsOther: encoded.labels,
        })
      );
    });
}

// ============================================================================
// SERVICE LAYER
// ============================================================================

export const EpisodeEncodingServiceLive = Layer.succeed(
  EpisodeEncodingService,
  new EpisodeEncodingServiceImpl()
);

// ============================================================================
// CONVENIENCE FUNCTIONS
// ============================================================================

/**
 * Find co-occurring episodes (convenience wrapper)
 */
export const findEpisodeInteractions = (
  episodes: unknown,
  referenceTime: Date,
  config?: Partial<EncodingConfig>
): Effect.Effect<IntersectionResult, EncodingError, EpisodeEncodingService> => {
  return Effect.gen(function* (_) {
    const service = yield* _(EpisodeEncodingService);
    return yield* _(service.findEpisodeInteractions(episodes, referenceTime, config));
  });
};

/**
 * Run the episode interaction pipeline standalone
 */
export const runEpisodeInteractions = async (
  episodes: unknown,
  referenceTime: Date,
  config?: Partial<EncodingConfig>
): Promise<IntersectionResult> => {
  const program = pipe(
    findEpisodeInteractions(episodes, referenceTime, config),
    Effect.provide(EpisodeEncodingServiceLive)
  );

  return Effect.runPromise(program);
};

/**
 * Summarize an intersection result for reporting
 */
export const getIntersectionSummary = (result: IntersectionResult, width: number) => {
  const pairs = [...result.codings.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, coding]) => ({
      key,
      coding: coding.toString(),
      bits: coding.toString(2).padStart(width, "0"),
      overlapCount: popCount(coding),
    }));

  return {
    pairCount: result.keys.size,
    pairs,
  };
};
