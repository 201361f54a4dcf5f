import type { CheerioAPI } from 'cheerio';
import { z } from 'zod';
import { BaseAdapter } from './base-adapter.js';
import { HintSourceError } from '../errors.js';
import type { HintAdapterConfig, HintPreference, StreamHint, StreamRef } from '../types/adapter.js';
import { logger } from '../utils/logger.js';

/** Seconds either side of the approximate start worth searching */
export const APPROXIMATE_WINDOW_SECONDS = 60;

const requestsSchema = z
  .array(z.object({ started_at: z.string(), ended_at: z.string() }))
  .nonempty();

/**
 * StreamsCharts adapter.
 *
 * Stream pages live at `/channels/{login}/streams/{videoId}`. Two sources
 * of timing on the page:
 * - `div > div[data-requests]`: JSON list of stream segments with exact
 *   `started_at` / `ended_at`; present on most recent streams
 * - the first `time[datetime]`: rounded to the minute, so it only narrows
 *   the search to a two-minute window
 */
export class StreamsChartsAdapter extends BaseAdapter {
  readonly config: HintAdapterConfig = {
    id: 'streamscharts',
    name: 'StreamsCharts',
    baseUrl: 'https://streamscharts.com',
    hostnames: ['streamscharts.com', 'www.streamscharts.com'],
    rateLimitMs: 3000,
  };

  parseStreamUrl(url: URL): StreamRef | null {
    const segments = this.pathSegments(url);
    const [channels, login, kind, videoId] = segments;
    if (segments.length !== 4 || channels !== 'channels' || !login || kind !== 'streams' || !this.isVideoId(videoId)) {
      return null;
    }
    return { login: login.toLowerCase(), videoId };
  }

  streamPageUrl(ref: StreamRef): string {
    return `${this.config.baseUrl}/channels/${ref.login}/streams/${ref.videoId}`;
  }

  parse(html: string, ref: StreamRef, preference: HintPreference): StreamHint {
    const $ = this.load(html);

    if (preference === 'exact') return this.parseExact($, ref);
    if (preference === 'bruteforce') return this.parseApproximate($, ref);

    try {
      return this.parseExact($, ref);
    } catch (err) {
      if (!(err instanceof HintSourceError)) throw err;
      logger.debug({ source: this.config.id, reason: err.message }, 'No exact timestamps, falling back to approximate');
      return this.parseApproximate($, ref);
    }
  }

  private parseExact($: CheerioAPI, ref: StreamRef): StreamHint {
    const raw = $('div > div[data-requests]').first().attr('data-requests');
    if (!raw) throw this.error(`${this.config.name}: no stream request data on the page`);

    let requests: z.infer<typeof requestsSchema>;
    try {
      requests = requestsSchema.parse(JSON.parse(raw));
    } catch {
      throw this.error(`${this.config.name}: malformed stream request data`);
    }

    const start = this.timestamp(requests[0].started_at, 'stream start time');
    const end = this.timestamp(requests[requests.length - 1]?.ended_at, 'stream end time');

    return {
      ...ref,
      sourceId: this.config.id,
      precision: 'exact',
      start,
      end,
      window: { from: start, to: start },
    };
  }

  private parseApproximate($: CheerioAPI, ref: StreamRef): StreamHint {
    const datetime = $('time').first().attr('datetime');
    const start = this.timestamp(datetime, 'approximate start time');

    return {
      ...ref,
      sourceId: this.config.id,
      precision: 'approximate',
      start,
      end: null,
      window: {
        from: Math.max(0, start - APPROXIMATE_WINDOW_SECONDS),
        to: start + APPROXIMATE_WINDOW_SECONDS,
      },
    };
  }
}
