import { describe, it, expect } from 'vitest';
import { PlaylistParseError } from '../../src/errors.js';
import {
  isMutedPlaylist,
  parseMediaPlaylist,
  serializeMediaPlaylist,
  tryParseMediaPlaylist,
} from '../../src/playlist/m3u8.js';
import { loadFixture } from '../helpers/fixture-loader.js';

describe('parseMediaPlaylist', () => {
  it('should read the header tags and segments of a VOD playlist', () => {
    const playlist = parseMediaPlaylist(loadFixture('playlists', 'unmuted.m3u8'));

    expect(playlist).toEqual({
      version: 3,
      targetDuration: 10,
      mediaSequence: 0,
      discontinuitySequence: null,
      playlistType: 'EVENT',
      endList: true,
      segments: [
        { uri: '0.ts', duration: 10, title: '' },
        { uri: '1-unmuted.ts', duration: 10, title: '' },
        { uri: '2.ts', duration: 10, title: '' },
      ],
    });
  });

  it('should accept CRLF line endings and a byte order mark', () => {
    const text = '\uFEFF#EXTM3U\r\n#EXT-X-TARGETDURATION:6\r\n#EXTINF:5.5,intro\r\na.ts\r\n';

    const playlist = parseMediaPlaylist(text);

    expect(playlist.targetDuration).toBe(6);
    expect(playlist.segments).toEqual([{ uri: 'a.ts', duration: 5.5, title: 'intro' }]);
    expect(playlist.endList).toBe(false);
  });

  it('should reject documents that are not media playlists', () => {
    expect(() => parseMediaPlaylist('<html></html>')).toThrow('Missing #EXTM3U header');
    expect(() => parseMediaPlaylist(loadFixture('playlists', 'master.m3u8'))).toThrow(
      'Got a master playlist, expected a media playlist',
    );
    expect(() => parseMediaPlaylist('#EXTM3U\n#EXTINF:10,\na.ts\n')).toThrow('Missing #EXT-X-TARGETDURATION');
    expect(() => parseMediaPlaylist('#EXTM3U\n#EXT-X-TARGETDURATION:10\na.ts\n')).toThrow(
      'Segment URI without #EXTINF: a.ts',
    );
    expect(() => parseMediaPlaylist('#EXTM3U\n#EXT-X-TARGETDURATION:ten\n')).toThrow(PlaylistParseError);
  });
});

describe('tryParseMediaPlaylist', () => {
  it('should return null instead of throwing', () => {
    expect(tryParseMediaPlaylist('Access Denied')).toBeNull();
  });
});

describe('isMutedPlaylist', () => {
  it('should look for unmuted segments', () => {
    const playlist = parseMediaPlaylist(loadFixture('playlists', 'unmuted.m3u8'));

    expect(isMutedPlaylist(playlist)).toBe(true);
    expect(isMutedPlaylist({ ...playlist, segments: playlist.segments.slice(0, 1) })).toBe(false);
  });
});

describe('serializeMediaPlaylist', () => {
  it('should write the tags it parsed, in a fixed order', () => {
    const playlist = parseMediaPlaylist(loadFixture('playlists', 'unmuted.m3u8'));

    expect(serializeMediaPlaylist(playlist)).toBe(
      [
        '#EXTM3U',
        '#EXT-X-VERSION:3',
        '#EXT-X-TARGETDURATION:10',
        '#EXT-X-MEDIA-SEQUENCE:0',
        '#EXT-X-PLAYLIST-TYPE:EVENT',
        '#EXTINF:10.000,',
        '0.ts',
        '#EXTINF:10.000,',
        '1-unmuted.ts',
        '#EXTINF:10.000,',
        '2.ts',
        '#EXT-X-ENDLIST',
        '',
      ].join('\n'),
    );
  });
});
