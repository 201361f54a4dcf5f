import { describe, it, expect } from 'vitest';
import { buildClipUrl } from '../../src/clips/clip-url.js';
import { scanClips } from '../../src/clips/scan.js';
import { FakeVerifier, hitsOn, NO_RETRY } from '../helpers/fake-verifier.js';

const CLIP_HOST = 'clips-media-assets2.twitch.tv';

describe('buildClipUrl', () => {
  it('should address the clip by video id and offset', () => {
    expect(buildClipUrl('1000', 120, CLIP_HOST)).toBe('https://clips-media-assets2.twitch.tv/1000-offset-120.mp4');
  });
});

describe('scanClips', () => {
  it('should collect every clip in the range without stopping at the first', async () => {
    const verifier = new FakeVerifier(
      hitsOn([buildClipUrl('1000', 120, CLIP_HOST), buildClipUrl('1000', 2400, CLIP_HOST)]),
      (url) => (url.endsWith('-offset-120.mp4') ? 15 : 0),
    );

    const result = await scanClips(
      { videoId: '1000', start: 0, end: 3600 },
      { hosts: [CLIP_HOST], verifier, retry: NO_RETRY, concurrency: 50 },
    );

    expect(result.status).toBe('complete');
    expect(new Set(result.clips.map((c) => c.offset))).toEqual(new Set([120, 2400]));
    expect(result.clips).toHaveLength(2);
    expect(verifier.calls).toHaveLength(3601);
    expect(result.diagnostics.checked).toBe(3601);
  });

  it('should return clips in offset order with their URLs', async () => {
    const verifier = new FakeVerifier(
      hitsOn([buildClipUrl('1000', 2400, CLIP_HOST), buildClipUrl('1000', 120, CLIP_HOST)]),
    );

    const result = await scanClips(
      { videoId: '1000', start: 0, end: 3600, stride: 60 },
      { hosts: [CLIP_HOST], verifier, retry: NO_RETRY, concurrency: 8 },
    );

    expect(result.clips).toEqual([
      { url: 'https://clips-media-assets2.twitch.tv/1000-offset-120.mp4', host: CLIP_HOST, offset: 120 },
      { url: 'https://clips-media-assets2.twitch.tv/1000-offset-2400.mp4', host: CLIP_HOST, offset: 2400 },
    ]);
    expect(verifier.calls).toHaveLength(61);
  });

  it('should keep one entry per host that serves the clip', async () => {
    const hosts = [CLIP_HOST, 'clips-media-assets.example.net'];
    const verifier = new FakeVerifier(hitsOn(hosts.map((h) => buildClipUrl('1000', 5, h))));

    const result = await scanClips(
      { videoId: '1000', start: 0, end: 9 },
      { hosts, verifier, retry: NO_RETRY, concurrency: 4 },
    );

    expect(result.clips.map((c) => c.host)).toEqual(hosts);
    expect(verifier.calls).toHaveLength(20);
  });

  it('should return the clips found so far when aborted', async () => {
    const controller = new AbortController();
    const verifier = new FakeVerifier(
      hitsOn([buildClipUrl('1000', 2, CLIP_HOST), buildClipUrl('1000', 8, CLIP_HOST)]),
    );

    const result = await scanClips(
      { videoId: '1000', start: 0, end: 10 },
      {
        hosts: [CLIP_HOST],
        verifier,
        retry: NO_RETRY,
        concurrency: 1,
        signal: controller.signal,
        onProgress: ({ checked }) => {
          if (checked === 5) controller.abort(new Error('Interrupted'));
        },
      },
    );

    expect(result.status).toBe('aborted');
    if (result.status !== 'aborted') return;
    expect(result.clips.map((c) => c.offset)).toEqual([2]);
    expect(result.progress).toBeCloseTo(5 / 11);
    expect(result.reason).toBe('Interrupted');
  });

  it('should reject an inverted offset range', async () => {
    const verifier = new FakeVerifier(hitsOn([]));

    await expect(
      scanClips({ videoId: '1000', start: 10, end: 0 }, { hosts: [CLIP_HOST], verifier, retry: NO_RETRY, concurrency: 1 }),
    ).rejects.toThrow('start offset must not be after the end offset');
    expect(verifier.calls).toEqual([]);
  });
});
