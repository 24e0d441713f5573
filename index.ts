/**
 * Episode Bitwise Encoding
 *
 * Public API: the encoding algebra, encoding collections, the episode
 * timeline encoder and the Effect service around them.
 */

export * from './schemas/episodeEncoding';
export * from './services/encodingErrors';
export { EpisodeEncoding, popCount, type Bit, type TimeWindowOptions } from './services/episodeEncoding';
export {
  EncodingCollection,
  DenseCodeStore,
  SparseCodeStore,
  type CodeStore,
  type SparseColumn,
  type IntersectionLabels,
} from './services/encodingCollection';
export { encodeEpisodes, episodeInteractions, type EncodedEpisodes } from './services/episodeTimeline';
export {
  EpisodeEncodingService,
  EpisodeEncodingServiceLive,
  findEpisodeInteractions,
  runEpisodeInteractions,
  getIntersectionSummary,
  type IntersectionOptions,
} from './services/episodeEncoding.effect';
export { appLogger } from './services/appLogger';
export { runPromise, runSync, runSyncResult, runWithLogging, serializeError } from './services/runtime';
