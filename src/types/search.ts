export interface SearchProgress {
  /** Candidates fully resolved (every host tried or a hit found) */
  checked: number;
  total: number;
  /** `checked / total`, never decreasing over a search */
  fraction: number;
}

export interface SearchDiagnostics {
  /**
   * Timestamps or offsets counted as absent only because a host kept failing
   * transiently until the retry budget ran out. Ascending.
   */
  degraded: number[];
  /** Verify requests issued by candidates whose result was kept */
  verifyCalls: number;
  checked: number;
  total: number;
}

export interface VodHit {
  url: string;
  host: string;
  timestamp: number;
  /** The playlist references `-unmuted` segments and needs `fix` to play */
  muted: boolean;
}

export type VodSearchResult =
  | { status: 'found'; hit: VodHit; diagnostics: SearchDiagnostics }
  | { status: 'exhausted'; diagnostics: SearchDiagnostics }
  | { status: 'aborted'; reason: string; progress: number; diagnostics: SearchDiagnostics };

export interface ClipHit {
  url: string;
  host: string;
  offset: number;
}

export type ClipScanResult =
  | { status: 'complete'; clips: ClipHit[]; diagnostics: SearchDiagnostics }
  | {
      status: 'aborted';
      /** Clips confirmed before the abort; the rest of the range is unknown */
      clips: ClipHit[];
      reason: string;
      progress: number;
      diagnostics: SearchDiagnostics;
    };

export interface AvailableUrl {
  url: string;
  host: string;
  muted: boolean;
}

export interface AvailabilityResult {
  /** Every host confirmed to serve the playlist, in pool order */
  urls: AvailableUrl[];
  /** False when an abort cut the check short; more hosts may serve it */
  complete: boolean;
}
