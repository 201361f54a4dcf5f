export * from './types/index.js';
export * from './errors.js';

export { computeVodHash, vodDirectory, buildVodUrl, VOD_HASH_LENGTH, type VodUrlParts } from './vods/hash-url.js';
export {
  compileHostPool,
  loadDefaultHosts,
  mergeHosts,
  normalizeHost,
  readHostFile,
  type HostPools,
} from './vods/host-pool.js';
export {
  searchVod,
  checkAvailability,
  candidateTimestamps,
  type VodSearchOptions,
  type AvailabilityOptions,
} from './vods/search.js';

export { buildClipUrl } from './clips/clip-url.js';
export { scanClips, type ClipScanOptions } from './clips/scan.js';
export { extractClipSlug } from './clips/slug.js';

export {
  runSearch,
  abortReason,
  type AggregationPolicy,
  type CandidateSequence,
  type RankedHit,
  type Resolution,
  type SearchOptions,
  type SearchOutcome,
  type SearchStats,
} from './search/engine.js';
export { ascendingSequence, fromArray, hintedSequence, steppedSequence } from './search/ordering.js';

export { PlaylistVerifier, classifyPlaylistResponse, type HttpVerifierOptions } from './verify/playlist-verifier.js';
export { ClipVerifier, classifyClipResponse } from './verify/clip-verifier.js';
export { verifyWithRetry, backoffDelay, type VerifyAttempt } from './verify/retry.js';

export { validateVodTarget, validateClipTarget, validateConcurrency } from './pipeline/targets.js';
export type { VodTargetInput, ClipTargetInput } from './pipeline/targets.js';
export { parseTimestamp } from './utils/date.js';

export { getAdapter, getAllAdapters, findAdapterByHost } from './adapters/index.js';
export {
  AdapterHintSource,
  deriveFromUrl,
  fetchStreamHint,
  type HintFetchOptions,
  type HintSource,
} from './hints/hint-source.js';
export { findLiveStream, findClipBroadcast, type GqlOptions, type LiveStream } from './twitch/gql.js';

export {
  parseMediaPlaylist,
  tryParseMediaPlaylist,
  serializeMediaPlaylist,
  isMutedPlaylist,
} from './playlist/m3u8.js';
export {
  fixPlaylist,
  fixSegments,
  locatePlaylist,
  mutedSegmentUrl,
  probeSegments,
  type FixMethod,
  type FixOptions,
  type FixResult,
} from './playlist/fix.js';
