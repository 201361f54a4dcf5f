import crypto from 'node:crypto';
import type { VideoId } from '../types/target.js';

export const VOD_HASH_LENGTH = 20;

export interface VodUrlParts {
  login: string;
  videoId: VideoId;
  timestamp: number;
}

/**
 * First 20 hex chars of SHA-1 over `{login}_{videoId}_{timestamp}`.
 * Twitch uses this as the prefix of the VOD's storage directory.
 */
export function computeVodHash(login: string, videoId: VideoId, timestamp: number): string {
  return crypto
    .createHash('sha1')
    .update(`${login}_${videoId}_${timestamp}`)
    .digest('hex')
    .slice(0, VOD_HASH_LENGTH);
}

/** Directory name shared by every host: `{hash}_{login}_{videoId}_{timestamp}`. */
export function vodDirectory({ login, videoId, timestamp }: VodUrlParts): string {
  return `${computeVodHash(login, videoId, timestamp)}_${login}_${videoId}_${timestamp}`;
}

export function buildVodUrl(parts: VodUrlParts, host: string): string {
  return `https://${host}/${vodDirectory(parts)}/chunked/index-dvr.m3u8`;
}
