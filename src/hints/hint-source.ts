import type { Dispatcher } from 'undici';
import { findAdapterByHost } from '../adapters/index.js';
import { hintRateLimiter, type RateLimiter } from '../compliance/rate-limiter.js';
import { HintSourceError, UnsupportedUrlError } from '../errors.js';
import { fetchHttp } from '../net/http-client.js';
import type { HintAdapter, HintPreference, StreamHint, StreamRef } from '../types/adapter.js';
import { logger } from '../utils/logger.js';

const PAGE_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
};

export interface HintFetchOptions {
  preference?: HintPreference;
  dispatcher?: Dispatcher;
  rateLimiter?: RateLimiter;
  signal?: AbortSignal;
}

/** Supplies unverified start-time guesses for a broadcast. */
export interface HintSource {
  hintsFor(ref: StreamRef, signal?: AbortSignal): Promise<number[]>;
}

export async function fetchStreamHint(
  adapter: HintAdapter,
  ref: StreamRef,
  options: HintFetchOptions = {},
): Promise<StreamHint> {
  const { preference = 'auto', rateLimiter = hintRateLimiter } = options;
  const url = adapter.streamPageUrl(ref);
  const log = logger.child({ source: adapter.config.id, url });

  await rateLimiter.acquire(adapter.config.id, adapter.config.rateLimitMs);

  const startMs = Date.now();
  const { status, body } = await fetchHttp(url, {
    headers: PAGE_HEADERS,
    dispatcher: options.dispatcher,
    signal: options.signal,
  });
  log.debug({ status, durationMs: Date.now() - startMs }, 'Fetched hint page');

  if (status !== 200) {
    throw new HintSourceError(`${adapter.config.name} returned HTTP ${status}`, adapter.config.id);
  }

  const hint = adapter.parse(body, ref, preference);
  log.info({ precision: hint.precision, start: hint.start, end: hint.end }, 'Got stream timestamps');
  return hint;
}

/** Routes a TwitchTracker or StreamsCharts stream URL to its adapter and scrapes it. */
export async function deriveFromUrl(rawUrl: string, options: HintFetchOptions = {}): Promise<StreamHint> {
  let url: URL;
  try {
    url = new URL(rawUrl.trim());
  } catch {
    throw new UnsupportedUrlError(`Not a URL: ${rawUrl}`);
  }

  const adapter = findAdapterByHost(url.hostname);
  if (!adapter) {
    throw new UnsupportedUrlError('Only twitchtracker.com and streamscharts.com URLs are supported');
  }

  const ref = adapter.parseStreamUrl(url);
  if (!ref) throw new UnsupportedUrlError(`Not a valid ${adapter.config.name} stream URL`);

  return fetchStreamHint(adapter, ref, options);
}

/**
 * Hint source backed by a scraping adapter. A failing page yields no
 * hints; the search still works, it just starts from the range edge.
 */
export class AdapterHintSource implements HintSource {
  constructor(
    private readonly adapter: HintAdapter,
    private readonly options: HintFetchOptions = {},
  ) {}

  async hintsFor(ref: StreamRef, signal?: AbortSignal): Promise<number[]> {
    try {
      const hint = await fetchStreamHint(this.adapter, ref, { ...this.options, signal });
      return [hint.start];
    } catch (err) {
      if (signal?.aborted) throw err;
      logger.warn({ source: this.adapter.config.id, err }, 'Hint source failed, searching without hints');
      return [];
    }
  }
}
