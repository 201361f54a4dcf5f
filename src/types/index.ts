export type { MediaPlaylist, MediaSegment, PlaylistType } from './playlist.js';
export type { VideoId, VodMode, VodTarget, ClipTarget } from './target.js';
export type { ProbeOutcome, Verifier, RetryPolicy } from './probe.js';
export type {
  SearchProgress,
  SearchDiagnostics,
  VodHit,
  VodSearchResult,
  ClipHit,
  ClipScanResult,
  AvailabilityResult,
  AvailableUrl,
} from './search.js';
export type {
  HintPreference,
  HintPrecision,
  StreamRef,
  StreamHint,
  HintAdapterConfig,
  HintAdapter,
} from './adapter.js';
