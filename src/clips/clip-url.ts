import type { VideoId } from '../types/target.js';

export function buildClipUrl(videoId: VideoId, offset: number, host: string): string {
  return `https://${host}/${videoId}-offset-${offset}.mp4`;
}
