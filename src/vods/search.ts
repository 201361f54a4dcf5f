import { validateConcurrency, validateVodTarget, type VodTargetInput } from '../pipeline/targets.js';
import { runSearch, type CandidateSequence, type Resolution, type SearchStats } from '../search/engine.js';
import { ascendingSequence, fromArray, hintedSequence } from '../search/ordering.js';
import { isMutedPlaylist } from '../playlist/m3u8.js';
import { verifyWithRetry } from '../verify/retry.js';
import { InvalidInputError } from '../errors.js';
import type { RetryPolicy, Verifier } from '../types/probe.js';
import type {
  AvailabilityResult,
  AvailableUrl,
  SearchDiagnostics,
  SearchProgress,
  VodHit,
  VodSearchResult,
} from '../types/search.js';
import type { VodTarget } from '../types/target.js';
import { logger } from '../utils/logger.js';
import { buildVodUrl, type VodUrlParts } from './hash-url.js';

export interface VodSearchOptions {
  /** CDN hosts, probed in this order for every timestamp */
  hosts: readonly string[];
  verifier: Verifier;
  retry: RetryPolicy;
  concurrency: number;
  /** Unverified start times to try first */
  hints?: readonly number[];
  signal?: AbortSignal;
  onProgress?: (progress: SearchProgress) => void;
}

function requireHosts(hosts: readonly string[]): void {
  if (hosts.length === 0) throw new InvalidInputError('Host pool is empty');
}

export function candidateTimestamps(target: VodTarget, hints: readonly number[] = []): CandidateSequence<number> {
  const { mode } = target;
  if (mode.kind === 'exact') return ascendingSequence(mode.timestamp, mode.timestamp);
  return hints.length > 0 ? hintedSequence(mode.from, mode.to, hints) : ascendingSequence(mode.from, mode.to);
}

export function toDiagnostics(stats: SearchStats<number>): SearchDiagnostics {
  return {
    degraded: stats.degraded,
    verifyCalls: stats.verifyCalls,
    checked: stats.checked,
    total: stats.total,
  };
}

/**
 * Probes each host in order for one timestamp. The first hit ends the loop;
 * hosts that only failed transiently mark the timestamp as degraded.
 */
async function resolveTimestamp(
  target: VodTarget,
  timestamp: number,
  options: VodSearchOptions,
  signal: AbortSignal,
): Promise<Resolution<VodHit>> {
  let degraded = false;
  let verifyCalls = 0;

  for (const host of options.hosts) {
    const url = buildVodUrl({ login: target.login, videoId: target.videoId, timestamp }, host);
    const { outcome, attempts } = await verifyWithRetry(options.verifier, url, options.retry, signal);
    verifyCalls += attempts;

    if (outcome.kind === 'hit') {
      const muted = outcome.playlist ? isMutedPlaylist(outcome.playlist) : false;
      // An earlier host's transient failure no longer matters once one answers
      return { hits: [{ url, host, timestamp, muted }], degraded: false, verifyCalls };
    }
    if (outcome.kind === 'transient') degraded = true;
  }

  return { hits: [], degraded, verifyCalls };
}

/**
 * Finds the playlist URL of a VOD. Exact mode checks a single timestamp;
 * range mode searches `[from, to]`, hints first, and returns the
 * highest-priority timestamp that any host confirms.
 */
export async function searchVod(input: VodTargetInput, options: VodSearchOptions): Promise<VodSearchResult> {
  const target = validateVodTarget(input);
  requireHosts(options.hosts);
  const concurrency = validateConcurrency(options.concurrency);

  const candidates = candidateTimestamps(target, options.hints);
  const log = logger.child({ login: target.login, videoId: target.videoId, mode: target.mode.kind });
  log.info({ timestamps: candidates.size, hosts: options.hosts.length, concurrency }, 'Starting VOD search');

  const outcome = await runSearch<number, VodHit>({
    candidates,
    resolve: (timestamp, signal) => resolveTimestamp(target, timestamp, options, signal),
    policy: 'first',
    concurrency,
    signal: options.signal,
    onProgress: options.onProgress,
  });
  const diagnostics = toDiagnostics(outcome.stats);

  switch (outcome.state) {
    case 'found':
      log.info({ url: outcome.found.hit.url, timestamp: outcome.found.candidate }, 'Found VOD playlist');
      return { status: 'found', hit: outcome.found.hit, diagnostics };
    case 'aborted':
      return { status: 'aborted', reason: outcome.reason, progress: outcome.progress, diagnostics };
    case 'exhausted':
    case 'complete':
      if (diagnostics.degraded.length > 0) {
        log.warn({ degraded: diagnostics.degraded.length }, 'No match, but some timestamps hit network trouble');
      } else {
        log.info('No match in range');
      }
      return { status: 'exhausted', diagnostics };
  }
}

export interface AvailabilityOptions {
  hosts: readonly string[];
  verifier: Verifier;
  retry: RetryPolicy;
  concurrency: number;
  signal?: AbortSignal;
}

/** Every host that serves the playlist for a known timestamp, in pool order. */
export async function checkAvailability(parts: VodUrlParts, options: AvailabilityOptions): Promise<AvailabilityResult> {
  requireHosts(options.hosts);

  const outcome = await runSearch<string, AvailableUrl>({
    candidates: fromArray(options.hosts),
    resolve: async (host, signal) => {
      const url = buildVodUrl(parts, host);
      const { outcome: probe, attempts } = await verifyWithRetry(options.verifier, url, options.retry, signal);
      if (probe.kind !== 'hit') {
        return { hits: [], degraded: probe.kind === 'transient', verifyCalls: attempts };
      }
      const muted = probe.playlist ? isMutedPlaylist(probe.playlist) : false;
      return { hits: [{ url, host, muted }], degraded: false, verifyCalls: attempts };
    },
    policy: 'all',
    concurrency: validateConcurrency(options.concurrency),
    signal: options.signal,
  });

  switch (outcome.state) {
    case 'complete':
      return { urls: outcome.hits.map((h) => h.hit), complete: true };
    case 'aborted':
      return { urls: outcome.hits.map((h) => h.hit), complete: false };
    case 'found':
    case 'exhausted':
      // Not produced under the `all` policy
      return { urls: [], complete: true };
  }
}
