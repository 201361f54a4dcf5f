import { describe, it, expect } from 'vitest';
import { buildVodUrl, computeVodHash, vodDirectory } from '../../src/vods/hash-url.js';

describe('computeVodHash', () => {
  it('should take the first 20 hex chars of the SHA-1', () => {
    expect(computeVodHash('dansgaming', '42218705421', 1622854217)).toBe('d3dcbaf880c9e36ed8c8');
    expect(computeVodHash('destiny', '39700667438', 1605781794)).toBe('3d36eb78bcccc84818e1');
  });

  it('should change with the timestamp', () => {
    expect(computeVodHash('destiny', '39700667438', 1605781795)).not.toBe('3d36eb78bcccc84818e1');
  });
});

describe('buildVodUrl', () => {
  it('should place the hashed directory under the host', () => {
    const parts = { login: 'destiny', videoId: '39700667438', timestamp: 1605781794 };

    expect(vodDirectory(parts)).toBe('3d36eb78bcccc84818e1_destiny_39700667438_1605781794');
    expect(buildVodUrl(parts, 'vod-secure.twitch.tv')).toBe(
      'https://vod-secure.twitch.tv/3d36eb78bcccc84818e1_destiny_39700667438_1605781794/chunked/index-dvr.m3u8',
    );
  });

  it('should return the same URL for the same inputs', () => {
    const parts = { login: 'tester', videoId: '1000', timestamp: 1700000000 };
    const first = buildVodUrl(parts, 'd2nvs31859zcd8.cloudfront.net');
    const second = buildVodUrl({ ...parts }, 'd2nvs31859zcd8.cloudfront.net');

    expect(first).toBe(second);
    expect(first).toBe(
      'https://d2nvs31859zcd8.cloudfront.net/b9f5ad9aee65ce439ced_tester_1000_1700000000/chunked/index-dvr.m3u8',
    );
  });
});
