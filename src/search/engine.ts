import type { SearchProgress } from '../types/search.js';
import { logger } from '../utils/logger.js';

/** Candidates in priority order. Index 0 is tried first. */
export interface CandidateSequence<C> {
  readonly size: number;
  at(index: number): C;
}

export interface Resolution<H> {
  hits: H[];
  /** At least one host only failed transiently, so "no hit" is best-effort */
  degraded: boolean;
  verifyCalls: number;
}

/**
 * `first` stops at the highest-priority hit; `all` keeps going over the
 * whole sequence and returns every hit.
 */
export type AggregationPolicy = 'first' | 'all';

export interface SearchOptions<C, H> {
  candidates: CandidateSequence<C>;
  resolve: (candidate: C, signal: AbortSignal) => Promise<Resolution<H>>;
  policy: AggregationPolicy;
  /** Ceiling on candidates resolving at once */
  concurrency: number;
  signal?: AbortSignal;
  onProgress?: (progress: SearchProgress) => void;
}

export interface SearchStats<C> {
  checked: number;
  total: number;
  degraded: C[];
  verifyCalls: number;
}

export interface RankedHit<C, H> {
  index: number;
  candidate: C;
  hit: H;
}

export type SearchOutcome<C, H> =
  | { state: 'found'; found: RankedHit<C, H>; stats: SearchStats<C> }
  | { state: 'exhausted'; stats: SearchStats<C> }
  | { state: 'complete'; hits: RankedHit<C, H>[]; stats: SearchStats<C> }
  | {
      state: 'aborted';
      reason: string;
      progress: number;
      hits: RankedHit<C, H>[];
      stats: SearchStats<C>;
    };

type StopReason = 'found' | 'aborted' | 'failed';

interface RunState {
  cursor: number;
  /** Nothing at or past this index is dispatched */
  limit: number;
  /** Lowest index that has not resolved yet */
  frontier: number;
  committed: number | null;
  checked: number;
  verifyCalls: number;
  stopReason: StopReason | null;
  failure: unknown;
}

export function abortReason(signal: AbortSignal): string {
  const { reason } = signal;
  if (reason instanceof Error) return reason.message;
  return reason === undefined ? 'aborted' : String(reason);
}

/**
 * Bounded-concurrency search over a candidate sequence.
 *
 * Workers pull indexes from a shared cursor, so dispatch follows priority
 * order while completion order is whatever the network makes it. Under the
 * `first` policy a hit is only committed once every higher-priority candidate
 * has resolved without one; the result therefore does not depend on timing.
 * After a hit at index i nothing past i is dispatched, and committing it
 * aborts whatever is still in flight.
 */
export async function runSearch<C, H>(options: SearchOptions<C, H>): Promise<SearchOutcome<C, H>> {
  const { candidates, resolve, policy, signal, onProgress } = options;
  const total = candidates.size;
  const log = logger.child({ module: 'search', policy, total });

  const controller = new AbortController();
  const resolved = new Uint8Array(total);
  const hitsByIndex = new Map<number, H[]>();
  const degradedIndexes: number[] = [];

  const run: RunState = {
    cursor: 0,
    limit: total,
    frontier: 0,
    committed: null,
    checked: 0,
    verifyCalls: 0,
    stopReason: null,
    failure: null,
  };

  const stop = (reason: StopReason): void => {
    if (run.stopReason !== null) return;
    run.stopReason = reason;
    controller.abort(reason);
  };

  const onExternalAbort = (): void => stop('aborted');
  if (signal?.aborted) {
    stop('aborted');
  } else {
    signal?.addEventListener('abort', onExternalAbort, { once: true });
  }

  const advanceFrontier = (): void => {
    while (run.frontier < total && resolved[run.frontier] === 1) {
      if (policy === 'first' && hitsByIndex.has(run.frontier)) {
        run.committed = run.frontier;
        log.debug({ index: run.frontier, checked: run.checked }, 'Committed highest-priority hit');
        stop('found');
        return;
      }
      run.frontier++;
    }
  };

  const worker = async (): Promise<void> => {
    while (run.stopReason === null && run.cursor < run.limit) {
      const index = run.cursor++;
      try {
        const resolution = await resolve(candidates.at(index), controller.signal);
        // Late results after a stop are dropped
        if (run.stopReason !== null) return;

        resolved[index] = 1;
        run.checked++;
        run.verifyCalls += resolution.verifyCalls;
        if (resolution.degraded) degradedIndexes.push(index);
        if (resolution.hits.length > 0) {
          hitsByIndex.set(index, resolution.hits);
          if (policy === 'first' && index < run.limit) run.limit = index;
        }

        onProgress?.({ checked: run.checked, total, fraction: run.checked / total });
        advanceFrontier();
      } catch (err) {
        if (run.stopReason !== null) return;
        run.failure = err;
        stop('failed');
      }
    }
  };

  const workerCount = Math.max(1, Math.min(options.concurrency, total));
  try {
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
  } finally {
    signal?.removeEventListener('abort', onExternalAbort);
  }

  if (run.stopReason === 'failed') throw run.failure;

  const { checked, committed } = run;
  const stats: SearchStats<C> = {
    checked,
    total,
    degraded: degradedIndexes.sort((a, b) => a - b).map((i) => candidates.at(i)),
    verifyCalls: run.verifyCalls,
  };

  const rankedHits = (): RankedHit<C, H>[] =>
    [...hitsByIndex.entries()]
      .sort(([a], [b]) => a - b)
      .flatMap(([index, hits]) => hits.map((hit) => ({ index, candidate: candidates.at(index), hit })));

  if (committed !== null) {
    const hit = hitsByIndex.get(committed)?.[0];
    if (hit !== undefined) {
      return { state: 'found', found: { index: committed, candidate: candidates.at(committed), hit }, stats };
    }
  }

  if (run.stopReason === 'aborted' && checked < total) {
    const reason = signal ? abortReason(signal) : 'aborted';
    log.info({ checked, reason }, 'Search aborted');
    return { state: 'aborted', reason, progress: checked / total, hits: rankedHits(), stats };
  }

  if (policy === 'first') return { state: 'exhausted', stats };
  return { state: 'complete', hits: rankedHits(), stats };
}
