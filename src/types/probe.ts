import type { MediaPlaylist } from './playlist.js';

export type ProbeOutcome =
  | { kind: 'hit'; url: string; playlist: MediaPlaylist | null }
  | { kind: 'miss'; url: string; status: number | null }
  | { kind: 'transient'; url: string; reason: string };

export interface Verifier {
  verify(url: string, signal?: AbortSignal): Promise<ProbeOutcome>;
}

export interface RetryPolicy {
  /** Extra attempts after the first one */
  maxRetries: number;
  backoff: { type: 'exponential' | 'fixed'; delay: number; maxDelay: number };
}
