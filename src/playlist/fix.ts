import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Dispatcher } from 'undici';
import { HttpStatusError, UnsupportedUrlError } from '../errors.js';
import { fetchHttp } from '../net/http-client.js';
import { runSearch } from '../search/engine.js';
import { fromArray } from '../search/ordering.js';
import type { MediaPlaylist, MediaSegment } from '../types/playlist.js';
import { logger } from '../utils/logger.js';
import { parseMediaPlaylist, serializeMediaPlaylist } from './m3u8.js';

const ALLOWED_DOMAINS = ['twitch.tv', 'cloudfront.net'];

/**
 * `rewrite` swaps every `-unmuted.ts` name for `-muted.ts`. `probe` asks the
 * CDN about each segment and only switches the ones it refuses with 403.
 */
export type FixMethod = 'rewrite' | 'probe';

export interface FixOptions {
  /** Output file; defaults to `muted_{dir}.m3u8` in the working directory */
  output?: string;
  method?: FixMethod;
  /** Segments probed at once under the `probe` method */
  concurrency?: number;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
  signal?: AbortSignal;
}

export interface FixResult {
  path: string;
  playlist: MediaPlaylist;
}

export interface PlaylistLocation {
  host: string;
  directory: string;
  /** `https://{host}/{directory}/chunked/` */
  baseUrl: string;
}

function isAllowedHost(hostname: string): boolean {
  return ALLOWED_DOMAINS.some((domain) => hostname === domain || hostname.endsWith(`.${domain}`));
}

export function locatePlaylist(rawUrl: string): PlaylistLocation {
  let url: URL;
  try {
    url = new URL(rawUrl.trim());
  } catch {
    throw new UnsupportedUrlError(`Not a URL: ${rawUrl}`);
  }

  const host = url.hostname.toLowerCase();
  if (!isAllowedHost(host)) {
    throw new UnsupportedUrlError('Only twitch.tv and cloudfront.net playlist URLs are supported');
  }

  const directory = url.pathname.split('/').find((s) => s.length > 0);
  if (!directory) throw new UnsupportedUrlError('Playlist URL has no VOD directory');

  return { host, directory, baseUrl: `https://${host}/${directory}/chunked/` };
}

/** Makes every segment absolute and points unmuted segments at their muted copies. */
export function fixSegments(playlist: MediaPlaylist, baseUrl: string): MediaPlaylist {
  return {
    ...playlist,
    segments: playlist.segments.map((segment) => {
      const uri = segment.uri.replace(/-unmuted\.ts$/, '-muted.ts');
      return { ...segment, uri: new URL(uri, baseUrl).toString() };
    }),
  };
}

export interface ProbeSegmentsOptions {
  concurrency?: number;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
  signal?: AbortSignal;
}

/** Points a segment at its muted copy: `N.ts` and `N-unmuted.ts` both become `N-muted.ts`. */
export function mutedSegmentUrl(url: string): string {
  return url.replace(/(?:-unmuted)?\.ts$/, '-muted.ts');
}

/**
 * HEADs every segment against `baseUrl` and switches the ones answered with
 * 403 to their muted copies. Segment order is kept.
 */
export async function probeSegments(
  playlist: MediaPlaylist,
  baseUrl: string,
  options: ProbeSegmentsOptions = {},
): Promise<MediaPlaylist> {
  const outcome = await runSearch<MediaSegment, MediaSegment>({
    candidates: fromArray(playlist.segments),
    resolve: async (segment, signal) => {
      const url = new URL(segment.uri, baseUrl).toString();
      const { status } = await fetchHttp(url, {
        method: 'HEAD',
        timeoutMs: options.timeoutMs,
        dispatcher: options.dispatcher,
        signal,
      });
      const uri = status === 403 ? mutedSegmentUrl(url) : url;
      return { hits: [{ ...segment, uri }], degraded: false, verifyCalls: 1 };
    },
    policy: 'all',
    concurrency: options.concurrency ?? 20,
    signal: options.signal,
  });

  switch (outcome.state) {
    case 'complete':
      return { ...playlist, segments: outcome.hits.map((h) => h.hit) };
    case 'aborted':
      throw new Error(`Segment check aborted: ${outcome.reason}`);
    case 'found':
    case 'exhausted':
      throw new Error('Segment check did not finish');
  }
}

/** Downloads an unmuted VOD playlist and writes a playable muted copy to disk. */
export async function fixPlaylist(rawUrl: string, options: FixOptions = {}): Promise<FixResult> {
  const location = locatePlaylist(rawUrl);
  const log = logger.child({ host: location.host, directory: location.directory });

  const { status, body } = await fetchHttp(rawUrl.trim(), {
    timeoutMs: options.timeoutMs,
    dispatcher: options.dispatcher,
    signal: options.signal,
  });
  if (status !== 200) throw new HttpStatusError(rawUrl.trim(), status);

  const parsed = parseMediaPlaylist(body);
  const playlist =
    options.method === 'probe'
      ? await probeSegments(parsed, location.baseUrl, {
          concurrency: options.concurrency,
          timeoutMs: options.timeoutMs,
          dispatcher: options.dispatcher,
          signal: options.signal,
        })
      : fixSegments(parsed, location.baseUrl);
  const outPath = path.resolve(options.output ?? `muted_${location.directory}.m3u8`);
  await writeFile(outPath, serializeMediaPlaylist(playlist), 'utf8');

  log.info(
    { path: outPath, segments: playlist.segments.length, method: options.method ?? 'rewrite' },
    'Wrote fixed playlist',
  );
  return { path: outPath, playlist };
}
