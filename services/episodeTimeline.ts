/**
 * Episode timeline encoding
 *
 * Turns a patient's labelled episodes (typically medication courses) into a
 * dense encoding collection anchored on a reference event, and finds which
 * episodes co-occur, allowing for a lingering effect after each one ends.
 */

import {
  type EncodingConfig,
  type Episode,
  type IntersectionResult,
  resolveEncodingConfig,
} from '../schemas/episodeEncoding';
import { EncodingCollection } from './encodingCollection';
import { EpisodeEncoding } from './episodeEncoding';

export interface EncodedEpisodes {
  readonly collection: EncodingCollection;
  readonly labels: ReadonlyArray<string>;
}

export const encodeEpisodes = (
  episodes: ReadonlyArray<Episode>,
  referenceTime: Date,
  overrides?: Partial<EncodingConfig>
): EncodedEpisodes => {
  const config = resolveEncodingConfig(overrides);

  const codes = episodes.map((episode) =>
    EpisodeEncoding.fromTimeWindow(
      { start: episode.start, end: episode.end, referenceTime },
      { step: config.step, bitCount: config.bitCount }
    ).value
  );

  return {
    collection: EncodingCollection.dense(codes, config.bitCount),
    labels: episodes.map((episode) => episode.label),
  };
};

/**
 * Every pair of episodes (i < j) whose post-expanded windows overlap,
 * keyed "labelA - labelB".
 */
export const episodeInteractions = (
  episodes: ReadonlyArray<Episode>,
  referenceTime: Date,
  overrides?: Partial<EncodingConfig>
): IntersectionResult => {
  const config = resolveEncodingConfig(overrides);
  const { collection, labels } = encodeEpisodes(episodes, referenceTime, config);
  return collection.intersection(collection, config.postExpandBits, {
    labelsSelf: labels,
    labelsOther: labels,
  });
};
