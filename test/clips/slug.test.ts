import { describe, it, expect } from 'vitest';
import { extractClipSlug } from '../../src/clips/slug.js';
import { UnsupportedUrlError } from '../../src/errors.js';

describe('extractClipSlug', () => {
  it('should accept a bare slug', () => {
    expect(extractClipSlug('  CleverSlugName-AbC123_x ')).toBe('CleverSlugName-AbC123_x');
  });

  it('should read the slug from a channel clip URL', () => {
    expect(extractClipSlug('https://www.twitch.tv/destiny/clip/CleverSlugName-AbC123')).toBe('CleverSlugName-AbC123');
    expect(extractClipSlug('https://m.twitch.tv/destiny/clip/CleverSlugName?filter=clips')).toBe('CleverSlugName');
  });

  it('should read the slug from a clips.twitch.tv URL', () => {
    expect(extractClipSlug('https://clips.twitch.tv/CleverSlugName')).toBe('CleverSlugName');
  });

  it('should reject twitch URLs that are not clips', () => {
    expect(() => extractClipSlug('https://www.twitch.tv/destiny/videos/39700667438')).toThrow('Not a clip URL');
    expect(() => extractClipSlug('https://clips.twitch.tv/')).toThrow('Not a clip URL');
  });

  it('should reject other hosts', () => {
    expect(() => extractClipSlug('https://example.com/destiny/clip/CleverSlugName')).toThrow(
      'Only twitch.tv clip URLs are supported',
    );
    expect(() => extractClipSlug('https://example.com/x')).toThrow(UnsupportedUrlError);
  });

  it('should reject text that is neither a URL nor a slug', () => {
    expect(() => extractClipSlug('not a slug!')).toThrow('Not a clip URL');
  });
});
