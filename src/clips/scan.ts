import { validateClipTarget, validateConcurrency, type ClipTargetInput } from '../pipeline/targets.js';
import { runSearch, type Resolution } from '../search/engine.js';
import { steppedSequence } from '../search/ordering.js';
import { verifyWithRetry } from '../verify/retry.js';
import { InvalidInputError } from '../errors.js';
import type { RetryPolicy, Verifier } from '../types/probe.js';
import type { ClipHit, ClipScanResult, SearchProgress } from '../types/search.js';
import type { ClipTarget } from '../types/target.js';
import { logger } from '../utils/logger.js';
import { toDiagnostics } from '../vods/search.js';
import { buildClipUrl } from './clip-url.js';

export interface ClipScanOptions {
  /** Clip media hosts; every host is probed at every offset */
  hosts: readonly string[];
  verifier: Verifier;
  retry: RetryPolicy;
  concurrency: number;
  signal?: AbortSignal;
  onProgress?: (progress: SearchProgress) => void;
}

async function resolveOffset(
  target: ClipTarget,
  offset: number,
  options: ClipScanOptions,
  signal: AbortSignal,
): Promise<Resolution<ClipHit>> {
  const hits: ClipHit[] = [];
  let degraded = false;
  let verifyCalls = 0;

  for (const host of options.hosts) {
    const url = buildClipUrl(target.videoId, offset, host);
    const { outcome, attempts } = await verifyWithRetry(options.verifier, url, options.retry, signal);
    verifyCalls += attempts;

    if (outcome.kind === 'hit') {
      hits.push({ url, host, offset });
    } else if (outcome.kind === 'transient') {
      degraded = true;
    }
  }

  return { hits, degraded, verifyCalls };
}

/**
 * Scans `[start, end]` of a VOD for clips. Unlike the VOD search this never
 * stops on a hit: several clips can exist in one window, so the whole
 * range is covered unless the caller aborts.
 */
export async function scanClips(input: ClipTargetInput, options: ClipScanOptions): Promise<ClipScanResult> {
  const target = validateClipTarget(input);
  if (options.hosts.length === 0) throw new InvalidInputError('Clip host pool is empty');
  const concurrency = validateConcurrency(options.concurrency);

  const candidates = steppedSequence(target.start, target.end, target.stride);
  const log = logger.child({ videoId: target.videoId, start: target.start, end: target.end });
  log.info({ offsets: candidates.size, stride: target.stride, concurrency }, 'Starting clip scan');

  const outcome = await runSearch<number, ClipHit>({
    candidates,
    resolve: (offset, signal) => resolveOffset(target, offset, options, signal),
    policy: 'all',
    concurrency,
    signal: options.signal,
    onProgress: options.onProgress,
  });
  const diagnostics = toDiagnostics(outcome.stats);

  switch (outcome.state) {
    case 'aborted':
      return {
        status: 'aborted',
        clips: outcome.hits.map((h) => h.hit),
        reason: outcome.reason,
        progress: outcome.progress,
        diagnostics,
      };
    case 'complete': {
      const clips = outcome.hits.map((h) => h.hit);
      log.info({ clips: clips.length, degraded: diagnostics.degraded.length }, 'Clip scan finished');
      return { status: 'complete', clips, diagnostics };
    }
    case 'found':
    case 'exhausted':
      return { status: 'complete', clips: [], diagnostics };
  }
}
