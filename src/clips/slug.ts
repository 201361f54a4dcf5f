import { UnsupportedUrlError } from '../errors.js';

const SLUG_RE = /^[A-Za-z0-9_-]+$/;

function checkSlug(slug: string | undefined): string {
  if (!slug || !SLUG_RE.test(slug)) throw new UnsupportedUrlError('Not a clip URL');
  return slug;
}

/**
 * Accepts a bare slug, `twitch.tv/{login}/clip/{slug}` or `clips.twitch.tv/{slug}`.
 * Anything that parses as a URL on another host is rejected.
 */
export function extractClipSlug(input: string): string {
  const trimmed = input.trim();

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    // Not a URL: treat it as the slug itself
    return checkSlug(trimmed);
  }

  const segments = url.pathname.split('/').filter((s) => s.length > 0);
  switch (url.hostname.toLowerCase()) {
    case 'twitch.tv':
    case 'www.twitch.tv':
    case 'm.twitch.tv':
      if (segments.length >= 3 && segments[1] === 'clip') return checkSlug(segments[2]);
      throw new UnsupportedUrlError('Not a clip URL');
    case 'clips.twitch.tv':
      return checkSlug(segments[0]);
    default:
      throw new UnsupportedUrlError('Only twitch.tv clip URLs are supported');
  }
}
