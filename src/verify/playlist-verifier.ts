import type { Dispatcher } from 'undici';
import { fetchHttp, type HttpResult } from '../net/http-client.js';
import { tryParseMediaPlaylist } from '../playlist/m3u8.js';
import type { ProbeOutcome, Verifier } from '../types/probe.js';
import { classifyStatus, describeError } from './classify.js';

export interface HttpVerifierOptions {
  timeoutMs?: number;
  dispatcher?: Dispatcher;
}

export function classifyPlaylistResponse(url: string, response: HttpResult): ProbeOutcome {
  switch (classifyStatus(response.status)) {
    case 'transient':
      return { kind: 'transient', url, reason: `HTTP ${response.status}` };
    case 'miss':
      return { kind: 'miss', url, status: response.status };
    case 'ok': {
      const playlist = tryParseMediaPlaylist(response.body);
      return playlist ? { kind: 'hit', url, playlist } : { kind: 'miss', url, status: response.status };
    }
  }
}

/** GETs a candidate `index-dvr.m3u8` and checks that the body is a media playlist. */
export class PlaylistVerifier implements Verifier {
  constructor(private readonly options: HttpVerifierOptions = {}) {}

  async verify(url: string, signal?: AbortSignal): Promise<ProbeOutcome> {
    let response: HttpResult;
    try {
      response = await fetchHttp(url, {
        timeoutMs: this.options.timeoutMs,
        dispatcher: this.options.dispatcher,
        signal,
      });
    } catch (err) {
      // Cancellation is the caller's decision, not a network failure
      if (signal?.aborted) throw err;
      return { kind: 'transient', url, reason: describeError(err) };
    }
    return classifyPlaylistResponse(url, response);
  }
}
