import type { VideoId } from './target.js';

/** Which StreamsCharts extraction to use; `auto` tries exact first. */
export type HintPreference = 'exact' | 'bruteforce' | 'auto';
export type HintPrecision = 'exact' | 'approximate';

export interface StreamRef {
  login: string;
  videoId: VideoId;
}

/** What a hint site says about a broadcast. Never trusted without a verified hit. */
export interface StreamHint extends StreamRef {
  sourceId: string;
  precision: HintPrecision;
  /** Claimed broadcast start, Unix seconds */
  start: number;
  end: number | null;
  /** Window worth searching around `start` */
  window: { from: number; to: number };
}

export interface HintAdapterConfig {
  id: string;
  name: string;
  baseUrl: string;
  /** Hostnames whose stream pages this adapter understands */
  hostnames: string[];
  /** Minimum delay between requests in ms */
  rateLimitMs: number;
}

export interface HintAdapter {
  readonly config: HintAdapterConfig;

  /** Login and video id from a stream page URL, or null when the path is not one. */
  parseStreamUrl(url: URL): StreamRef | null;

  streamPageUrl(ref: StreamRef): string;

  /** Parse a fetched stream page. Throws HintSourceError when the page lacks the data. */
  parse(html: string, ref: StreamRef, preference: HintPreference): StreamHint;
}
