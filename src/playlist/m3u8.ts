import { PlaylistParseError } from '../errors.js';
import type { MediaPlaylist, MediaSegment } from '../types/playlist.js';

const TAG_RE = /^#(EXT[A-Z0-9-]*)(?::(.*))?$/;

function parseNumberTag(tag: string, value: string | undefined): number {
  const num = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isFinite(num)) {
    throw new PlaylistParseError(`Invalid value for #${tag}: ${value ?? '<missing>'}`);
  }
  return num;
}

/**
 * Parses an HLS media playlist. Master playlists, documents without the
 * `#EXTM3U` header and playlists without a target duration are rejected.
 * Unknown tags (Twitch adds a few `#EXT-X-TWITCH-*` ones) are skipped.
 */
export function parseMediaPlaylist(text: string): MediaPlaylist {
  const lines = text
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0);

  if (lines[0] !== '#EXTM3U') {
    throw new PlaylistParseError('Missing #EXTM3U header');
  }

  const playlist: MediaPlaylist = {
    version: null,
    targetDuration: Number.NaN,
    mediaSequence: 0,
    discontinuitySequence: null,
    playlistType: null,
    endList: false,
    segments: [],
  };

  let pending: Omit<MediaSegment, 'uri'> | null = null;

  for (const line of lines.slice(1)) {
    if (!line.startsWith('#')) {
      if (!pending) {
        throw new PlaylistParseError(`Segment URI without #EXTINF: ${line}`);
      }
      playlist.segments.push({ ...pending, uri: line });
      pending = null;
      continue;
    }

    const match = line.match(TAG_RE);
    if (!match) continue; // comment
    const [, tag, value] = match;

    switch (tag) {
      case 'EXT-X-STREAM-INF':
        throw new PlaylistParseError('Got a master playlist, expected a media playlist');
      case 'EXT-X-VERSION':
        playlist.version = parseNumberTag(tag, value);
        break;
      case 'EXT-X-TARGETDURATION':
        playlist.targetDuration = parseNumberTag(tag, value);
        break;
      case 'EXT-X-MEDIA-SEQUENCE':
        playlist.mediaSequence = parseNumberTag(tag, value);
        break;
      case 'EXT-X-DISCONTINUITY-SEQUENCE':
        playlist.discontinuitySequence = parseNumberTag(tag, value);
        break;
      case 'EXT-X-PLAYLIST-TYPE':
        if (value !== 'EVENT' && value !== 'VOD') {
          throw new PlaylistParseError(`Invalid playlist type: ${value ?? '<missing>'}`);
        }
        playlist.playlistType = value;
        break;
      case 'EXT-X-ENDLIST':
        playlist.endList = true;
        break;
      case 'EXTINF': {
        const [durationText = '', ...titleParts] = (value ?? '').split(',');
        pending = {
          duration: parseNumberTag(tag, durationText),
          title: titleParts.join(','),
        };
        break;
      }
      default:
        break;
    }
  }

  if (Number.isNaN(playlist.targetDuration)) {
    throw new PlaylistParseError('Missing #EXT-X-TARGETDURATION');
  }
  if (pending) {
    throw new PlaylistParseError('Playlist ends with #EXTINF but no segment URI');
  }

  return playlist;
}

/** Returns the parsed playlist, or null when the text is not a media playlist. */
export function tryParseMediaPlaylist(text: string): MediaPlaylist | null {
  try {
    return parseMediaPlaylist(text);
  } catch (err) {
    if (err instanceof PlaylistParseError) return null;
    throw err;
  }
}

/** Twitch serves `N-unmuted.ts` segments when parts of a VOD were muted and later restored. */
export function isMutedPlaylist(playlist: MediaPlaylist): boolean {
  return playlist.segments.some((s) => s.uri.includes('unmuted'));
}

function formatDuration(seconds: number): string {
  return seconds.toFixed(3);
}

export function serializeMediaPlaylist(playlist: MediaPlaylist): string {
  const lines = ['#EXTM3U'];
  if (playlist.version !== null) lines.push(`#EXT-X-VERSION:${playlist.version}`);
  lines.push(`#EXT-X-TARGETDURATION:${playlist.targetDuration}`);
  lines.push(`#EXT-X-MEDIA-SEQUENCE:${playlist.mediaSequence}`);
  if (playlist.discontinuitySequence !== null) {
    lines.push(`#EXT-X-DISCONTINUITY-SEQUENCE:${playlist.discontinuitySequence}`);
  }
  if (playlist.playlistType) lines.push(`#EXT-X-PLAYLIST-TYPE:${playlist.playlistType}`);

  for (const segment of playlist.segments) {
    lines.push(`#EXTINF:${formatDuration(segment.duration)},${segment.title}`);
    lines.push(segment.uri);
  }

  if (playlist.endList) lines.push('#EXT-X-ENDLIST');
  return `${lines.join('\n')}\n`;
}
