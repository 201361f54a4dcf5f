import { fetchHttp, headerValue, type HttpResult } from '../net/http-client.js';
import type { ProbeOutcome, Verifier } from '../types/probe.js';
import { classifyStatus, describeError } from './classify.js';
import type { HttpVerifierOptions } from './playlist-verifier.js';

function isMediaContentType(contentType: string | undefined): boolean {
  if (!contentType) return true;
  const type = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  return type.startsWith('video/') || type === 'application/octet-stream' || type === 'binary/octet-stream';
}

export function classifyClipResponse(url: string, response: HttpResult): ProbeOutcome {
  switch (classifyStatus(response.status)) {
    case 'transient':
      return { kind: 'transient', url, reason: `HTTP ${response.status}` };
    case 'miss':
      return { kind: 'miss', url, status: response.status };
    case 'ok':
      return isMediaContentType(headerValue(response.headers, 'content-type'))
        ? { kind: 'hit', url, playlist: null }
        : { kind: 'miss', url, status: response.status };
  }
}

/** HEADs a clip media URL; the body is never downloaded. */
export class ClipVerifier implements Verifier {
  constructor(private readonly options: HttpVerifierOptions = {}) {}

  async verify(url: string, signal?: AbortSignal): Promise<ProbeOutcome> {
    let response: HttpResult;
    try {
      response = await fetchHttp(url, {
        method: 'HEAD',
        timeoutMs: this.options.timeoutMs,
        dispatcher: this.options.dispatcher,
        signal,
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      return { kind: 'transient', url, reason: describeError(err) };
    }
    return classifyClipResponse(url, response);
  }
}
