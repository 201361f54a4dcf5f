export type PlaylistType = 'EVENT' | 'VOD';

export interface MediaSegment {
  uri: string;
  /** Seconds, from `#EXTINF` */
  duration: number;
  title: string;
}

/** The subset of an HLS media playlist the resolver reads and writes back. */
export interface MediaPlaylist {
  version: number | null;
  targetDuration: number;
  mediaSequence: number;
  discontinuitySequence: number | null;
  playlistType: PlaylistType | null;
  endList: boolean;
  segments: MediaSegment[];
}
