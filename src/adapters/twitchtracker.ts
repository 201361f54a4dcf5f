import { BaseAdapter } from './base-adapter.js';
import type { HintAdapterConfig, HintPreference, StreamHint, StreamRef } from '../types/adapter.js';

/**
 * TwitchTracker adapter.
 *
 * Stream pages live at `/{login}/streams/{videoId}` and print the start
 * time (UTC, `YYYY-MM-DD hh:mm:ss`) in `.stream-timestamp-dt.to-dowdatetime`.
 */
export class TwitchTrackerAdapter extends BaseAdapter {
  readonly config: HintAdapterConfig = {
    id: 'twitchtracker',
    name: 'TwitchTracker',
    baseUrl: 'https://twitchtracker.com',
    hostnames: ['twitchtracker.com', 'www.twitchtracker.com'],
    rateLimitMs: 2000,
  };

  parseStreamUrl(url: URL): StreamRef | null {
    const segments = this.pathSegments(url);
    const [login, kind, videoId] = segments;
    if (segments.length !== 3 || !login || kind !== 'streams' || !this.isVideoId(videoId)) return null;
    return { login: login.toLowerCase(), videoId };
  }

  streamPageUrl(ref: StreamRef): string {
    return `${this.config.baseUrl}/${ref.login}/streams/${ref.videoId}`;
  }

  parse(html: string, ref: StreamRef, _preference: HintPreference): StreamHint {
    const $ = this.load(html);
    const text = $('.stream-timestamp-dt.to-dowdatetime').first().text().trim();
    const start = this.timestamp(text, 'stream start time');

    return {
      ...ref,
      sourceId: this.config.id,
      precision: 'exact',
      start,
      end: null,
      window: { from: start, to: start },
    };
  }
}
