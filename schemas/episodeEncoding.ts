/**
 * EPISODE ENCODING SCHEMA
 *
 * Runtime-validated shapes for everything that crosses into the bitwise
 * encoding algebra from the outside: time windows, labelled episodes,
 * dimension-mapping weights and the encoding configuration.
 *
 * Timeline model:
 * - A reference instant (e.g. the adverse event) anchors the encoding
 * - The encoder walks `bitCount` steps of `step` away from it
 * - Bit position 0 is the most distant sample, `bitCount - 1` the nearest
 */

import { Schema as S } from "effect";

// ============================================================================
// DATES & DURATIONS
// ============================================================================

/**
 * Accepts Date instances from in-memory callers and ISO strings from storage
 */
export const InstantSchema = S.Union(S.ValidDateFromSelf, S.Date);
export type Instant = S.Schema.Type<typeof InstantSchema>;

/**
 * Signed step between samples, in date-fns `Duration` shape.
 * Negative steps walk backward from the reference instant.
 */
export const StepDurationSchema = S.Struct({
  years: S.optional(S.Int),
  months: S.optional(S.Int),
  weeks: S.optional(S.Int),
  days: S.optional(S.Int),
  hours: S.optional(S.Int),
  minutes: S.optional(S.Int),
  seconds: S.optional(S.Int),
});
export type StepDuration = S.Schema.Type<typeof StepDurationSchema>;

// ============================================================================
// ENCODING CONFIGURATION
// ============================================================================

export const EncodingConfigSchema = S.Struct({
  bitCount: S.Int.pipe(S.positive()), // samples per encoding
  step: StepDurationSchema, // distance between samples
  postExpandBits: S.Int.pipe(S.nonNegative()), // lingering effect, in samples
});
export type EncodingConfig = S.Schema.Type<typeof EncodingConfigSchema>;

export const defaultEncodingConfig: EncodingConfig = {
  bitCount: 32,
  step: { days: -1 },
  postExpandBits: 0,
};

export const PartialEncodingConfigSchema = S.partial(EncodingConfigSchema);

/**
 * Merge caller overrides onto the defaults
 */
export const resolveEncodingConfig = (
  overrides?: Partial<EncodingConfig>
): EncodingConfig => ({
  ...defaultEncodingConfig,
  ...overrides,
});

// ============================================================================
// TIME WINDOW
// ============================================================================

export const TimeWindowSchema = S.Struct({
  start: InstantSchema,
  end: InstantSchema, // start > end is allowed and encodes to zero
  referenceTime: InstantSchema,
});
export type TimeWindow = S.Schema.Type<typeof TimeWindowSchema>;

// ============================================================================
// EPISODE (labelled activity period, e.g. a medication course)
// ============================================================================

export const EpisodeSchema = S.Struct({
  label: S.String.pipe(S.minLength(1)),
  start: InstantSchema,
  end: InstantSchema,
});
export type Episode = S.Schema.Type<typeof EpisodeSchema>;

export const EpisodeListSchema = S.Array(EpisodeSchema);

// ============================================================================
// DIMENSION MAPPING WEIGHTS
// ============================================================================

/**
 * weights[target][source]; {0, 1} selection masks in practice
 */
export const WeightsMatrixSchema = S.Array(
  S.Array(S.Union(S.Number.pipe(S.finite()), S.BigIntFromSelf))
);
export type WeightsMatrix = S.Schema.Type<typeof WeightsMatrixSchema>;

// ============================================================================
// INTERSECTION RESULT
// ============================================================================

export interface IntersectionResult {
  /** Key ("label - label" or "i j") to the non-zero interaction value */
  readonly codings: Map<string, bigint>;
  /** Keys of the non-zero interactions */
  readonly keys: Set<string>;
}
