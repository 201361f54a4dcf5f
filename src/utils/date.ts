import { InvalidInputError } from '../errors.js';

const UNIX_RE = /^\d+$/;
const YMD_HMS_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})(?: UTC)?$/;
const DMY_HM_RE = /^(\d{2})-(\d{2})-(\d{4}) (\d{2}):(\d{2})$/;
const RFC3339_RE = /^\d{4}-\d{2}-\d{2}[Tt ]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:[Zz]|[+-]\d{2}:\d{2})$/;

function utcSeconds(year: number, month: number, day: number, hour: number, minute: number, second: number): number | null {
  const ms = Date.UTC(year, month - 1, day, hour, minute, second);
  const date = new Date(ms);
  // Date.UTC rolls 2022-02-30 over into March; treat that as invalid
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return null;
  }
  return ms / 1000;
}

/**
 * Parses a broadcast timestamp into Unix seconds. Accepts Unix seconds,
 * `2022-07-15 07:49:56`, the same with ` UTC`, RFC 3339 and
 * `15-07-2022 07:49`. Zone-less forms are read as UTC.
 */
export function parseTimestamp(raw: string): number {
  const text = raw.trim();

  if (UNIX_RE.test(text)) {
    const value = Number(text);
    if (Number.isSafeInteger(value)) return value;
    throw new InvalidInputError(`Timestamp out of range: ${raw}`);
  }

  let seconds: number | null = null;
  const ymd = text.match(YMD_HMS_RE);
  const dmy = text.match(DMY_HM_RE);

  if (ymd) {
    const [, y, mo, d, h, mi, s] = ymd.map(Number);
    seconds = utcSeconds(y ?? NaN, mo ?? NaN, d ?? NaN, h ?? NaN, mi ?? NaN, s ?? NaN);
  } else if (dmy) {
    const [, d, mo, y, h, mi] = dmy.map(Number);
    seconds = utcSeconds(y ?? NaN, mo ?? NaN, d ?? NaN, h ?? NaN, mi ?? NaN, 0);
  } else if (RFC3339_RE.test(text)) {
    const ms = Date.parse(text.replace(' ', 'T'));
    seconds = Number.isNaN(ms) ? null : Math.floor(ms / 1000);
  }

  if (seconds === null || seconds < 0) {
    throw new InvalidInputError(`Couldn't parse the timestamp: ${raw}`);
  }
  return seconds;
}
