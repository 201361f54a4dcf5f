import { describe, it, expect } from 'vitest';
import { InvalidInputError } from '../../src/errors.js';
import { validateClipTarget, validateConcurrency, validateVodTarget } from '../../src/pipeline/targets.js';

describe('validateVodTarget', () => {
  it('should normalise the login and video id', () => {
    const target = validateVodTarget({
      login: '  DansGaming ',
      videoId: 42218705421,
      mode: { kind: 'exact', timestamp: 1622854217 },
    });

    expect(target).toEqual({
      login: 'dansgaming',
      videoId: '42218705421',
      mode: { kind: 'exact', timestamp: 1622854217 },
    });
  });

  it('should accept the full unsigned 64-bit range for video ids', () => {
    const target = validateVodTarget({
      login: 'destiny',
      videoId: '18446744073709551615',
      mode: { kind: 'range', from: 1, to: 1 },
    });

    expect(target.videoId).toBe('18446744073709551615');
    expect(validateVodTarget({ ...target, videoId: '007' }).videoId).toBe('7');
  });

  it('should reject video ids that are not unsigned 64-bit integers', () => {
    for (const videoId of ['18446744073709551616', '-1', '12a', '']) {
      expect(() =>
        validateVodTarget({ login: 'destiny', videoId, mode: { kind: 'exact', timestamp: 1 } }),
      ).toThrow(InvalidInputError);
    }
  });

  it('should reject logins twitch would not issue', () => {
    expect(() =>
      validateVodTarget({ login: 'no spaces', videoId: '1', mode: { kind: 'exact', timestamp: 1 } }),
    ).toThrow('login must be 1-25 letters, digits or underscores');
    expect(() =>
      validateVodTarget({ login: 'a'.repeat(26), videoId: '1', mode: { kind: 'exact', timestamp: 1 } }),
    ).toThrow(InvalidInputError);
  });

  it('should list every problem on the error', () => {
    try {
      validateVodTarget({ login: '', videoId: '1', mode: { kind: 'range', from: -1, to: 5 } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      if (!(err instanceof InvalidInputError)) return;
      expect(err.issues).toHaveLength(2);
      expect(err.issues[0]).toMatch(/^login: /);
      expect(err.issues[1]).toMatch(/^mode\.from: /);
    }
  });

  it('should reject an inverted range', () => {
    expect(() =>
      validateVodTarget({ login: 'destiny', videoId: '1', mode: { kind: 'range', from: 10, to: 9 } }),
    ).toThrow('Invalid VOD target: mode: range start must not be after its end');
  });
});

describe('validateClipTarget', () => {
  it('should default the stride to one second', () => {
    expect(validateClipTarget({ videoId: '1000', start: 0, end: 3600 })).toEqual({
      videoId: '1000',
      start: 0,
      end: 3600,
      stride: 1,
    });
  });

  it('should reject a zero stride and fractional offsets', () => {
    expect(() => validateClipTarget({ videoId: '1000', start: 0, end: 10, stride: 0 })).toThrow(InvalidInputError);
    expect(() => validateClipTarget({ videoId: '1000', start: 0.5, end: 10 })).toThrow(InvalidInputError);
  });
});

describe('validateConcurrency', () => {
  it('should require a positive integer', () => {
    expect(validateConcurrency(100)).toBe(100);
    expect(() => validateConcurrency(0)).toThrow('Invalid concurrency');
    expect(() => validateConcurrency(2.5)).toThrow(InvalidInputError);
  });
});
