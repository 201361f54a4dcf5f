import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { MockAgent } from 'undici';
import { UnsupportedUrlError } from '../../src/errors.js';
import { fixPlaylist, fixSegments, locatePlaylist, mutedSegmentUrl, probeSegments } from '../../src/playlist/fix.js';
import { parseMediaPlaylist } from '../../src/playlist/m3u8.js';
import { loadFixture } from '../helpers/fixture-loader.js';

const ORIGIN = 'https://d2nvs31859zcd8.cloudfront.net';
const DIRECTORY = '3d36eb78bcccc84818e1_destiny_39700667438_1605781794';
const PLAYLIST_URL = `${ORIGIN}/${DIRECTORY}/chunked/index-dvr.m3u8`;
const BASE_URL = `${ORIGIN}/${DIRECTORY}/chunked/`;

describe('locatePlaylist', () => {
  it('should derive the segment base from the VOD directory', () => {
    expect(locatePlaylist(PLAYLIST_URL)).toEqual({
      host: 'd2nvs31859zcd8.cloudfront.net',
      directory: DIRECTORY,
      baseUrl: BASE_URL,
    });
  });

  it('should only accept twitch.tv and cloudfront.net hosts', () => {
    expect(locatePlaylist(`https://vod-secure.twitch.tv/${DIRECTORY}/chunked/index-dvr.m3u8`).host).toBe(
      'vod-secure.twitch.tv',
    );
    expect(() => locatePlaylist('https://example.com/dir/chunked/index-dvr.m3u8')).toThrow(UnsupportedUrlError);
    expect(() => locatePlaylist('https://nottwitch.tv/dir/index-dvr.m3u8')).toThrow(
      'Only twitch.tv and cloudfront.net playlist URLs are supported',
    );
    expect(() => locatePlaylist('index-dvr.m3u8')).toThrow('Not a URL: index-dvr.m3u8');
  });
});

describe('fixSegments', () => {
  it('should make segments absolute and swap unmuted for muted', () => {
    const playlist = fixSegments(parseMediaPlaylist(loadFixture('playlists', 'unmuted.m3u8')), BASE_URL);

    expect(playlist.segments.map((s) => s.uri)).toEqual([
      `${BASE_URL}0.ts`,
      `${BASE_URL}1-muted.ts`,
      `${BASE_URL}2.ts`,
    ]);
    expect(playlist.targetDuration).toBe(10);
  });
});

describe('mutedSegmentUrl', () => {
  it('should point plain and unmuted segments at the muted copy', () => {
    expect(mutedSegmentUrl(`${BASE_URL}12.ts`)).toBe(`${BASE_URL}12-muted.ts`);
    expect(mutedSegmentUrl(`${BASE_URL}12-unmuted.ts`)).toBe(`${BASE_URL}12-muted.ts`);
  });
});

describe('probeSegments', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('should switch only the segments the CDN refuses', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: `/${DIRECTORY}/chunked/0.ts`, method: 'HEAD' }).reply(200, '');
    pool.intercept({ path: `/${DIRECTORY}/chunked/1-unmuted.ts`, method: 'HEAD' }).reply(403, '');
    pool.intercept({ path: `/${DIRECTORY}/chunked/2.ts`, method: 'HEAD' }).reply(403, '');
    const playlist = parseMediaPlaylist(loadFixture('playlists', 'unmuted.m3u8'));

    const fixed = await probeSegments(playlist, BASE_URL, { dispatcher: agent, concurrency: 2 });

    expect(fixed.segments.map((s) => s.uri)).toEqual([
      `${BASE_URL}0.ts`,
      `${BASE_URL}1-muted.ts`,
      `${BASE_URL}2-muted.ts`,
    ]);
    expect(fixed.segments.map((s) => s.duration)).toEqual([10, 10, 10]);
  });

  it('should fail when a segment cannot be reached', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: `/${DIRECTORY}/chunked/0.ts`, method: 'HEAD' }).replyWithError(new Error('socket hang up'));
    const playlist = parseMediaPlaylist(loadFixture('playlists', 'unmuted.m3u8'));

    await expect(probeSegments(playlist, BASE_URL, { dispatcher: agent, concurrency: 1 })).rejects.toThrow(
      'socket hang up',
    );
  });
});

describe('fixPlaylist', () => {
  let agent: MockAgent;
  let dir: string;

  beforeEach(async () => {
    agent = new MockAgent();
    agent.disableNetConnect();
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vod-resolver-fix-'));
  });

  afterEach(async () => {
    await agent.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should write the muted playlist to the output file', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: `/${DIRECTORY}/chunked/index-dvr.m3u8`, method: 'GET' })
      .reply(200, loadFixture('playlists', 'unmuted.m3u8'));
    const output = path.join(dir, 'fixed.m3u8');

    const result = await fixPlaylist(PLAYLIST_URL, { output, dispatcher: agent });

    expect(result.path).toBe(output);
    const written = await fs.readFile(output, 'utf-8');
    expect(written.split('\n')).toContain(`${BASE_URL}1-muted.ts`);
    expect(written.startsWith('#EXTM3U\n#EXT-X-VERSION:3\n')).toBe(true);
    expect(written.endsWith('#EXT-X-ENDLIST\n')).toBe(true);
  });

  it('should ask the CDN about each segment when that method is chosen', async () => {
    const pool = agent.get(ORIGIN);
    pool
      .intercept({ path: `/${DIRECTORY}/chunked/index-dvr.m3u8`, method: 'GET' })
      .reply(200, loadFixture('playlists', 'unmuted.m3u8'));
    pool.intercept({ path: `/${DIRECTORY}/chunked/0.ts`, method: 'HEAD' }).reply(200, '');
    pool.intercept({ path: `/${DIRECTORY}/chunked/1-unmuted.ts`, method: 'HEAD' }).reply(200, '');
    pool.intercept({ path: `/${DIRECTORY}/chunked/2.ts`, method: 'HEAD' }).reply(403, '');

    const result = await fixPlaylist(PLAYLIST_URL, {
      output: path.join(dir, 'probed.m3u8'),
      method: 'probe',
      dispatcher: agent,
    });

    expect(result.playlist.segments.map((s) => s.uri)).toEqual([
      `${BASE_URL}0.ts`,
      `${BASE_URL}1-unmuted.ts`,
      `${BASE_URL}2-muted.ts`,
    ]);
  });

  it('should fail on a playlist the CDN does not have', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: `/${DIRECTORY}/chunked/index-dvr.m3u8`, method: 'GET' })
      .reply(403, 'AccessDenied');

    await expect(fixPlaylist(PLAYLIST_URL, { output: path.join(dir, 'x.m3u8'), dispatcher: agent })).rejects.toThrow(
      `${PLAYLIST_URL} returned HTTP 403`,
    );
  });
});
