/** Decimal string of an unsigned 64-bit integer; kept as text so it never loses precision. */
export type VideoId = string;

export type VodMode =
  | { kind: 'exact'; timestamp: number }
  | { kind: 'range'; from: number; to: number };

export interface VodTarget {
  /** Normalized broadcaster login (lowercase) */
  login: string;
  videoId: VideoId;
  mode: VodMode;
}

export interface ClipTarget {
  videoId: VideoId;
  /** Offsets in seconds from the start of the VOD, inclusive */
  start: number;
  end: number;
  stride: number;
}
