import { request, type Dispatcher } from 'undici';
import { config } from '../config.js';

export interface HttpResult {
  body: string;
  status: number;
  headers: Record<string, string | string[] | undefined>;
}

export interface HttpRequestOptions {
  method?: 'GET' | 'HEAD' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  /** Deadline for the whole exchange, headers and body together */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** undici dispatcher; tests pass a MockAgent */
  dispatcher?: Dispatcher;
}

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': config.USER_AGENT,
  Accept: '*/*',
};

export async function fetchHttp(url: string, options: HttpRequestOptions = {}): Promise<HttpResult> {
  const { method = 'GET', timeoutMs = config.REQUEST_TIMEOUT_MS } = options;
  // A slow trickle never trips the idle timeouts below; the deadline does
  const deadline = AbortSignal.timeout(timeoutMs);
  const signal = options.signal ? AbortSignal.any([options.signal, deadline]) : deadline;

  const { statusCode, headers, body } = await request(url, {
    method,
    headers: { ...DEFAULT_HEADERS, ...options.headers },
    body: options.body,
    maxRedirections: 3,
    headersTimeout: timeoutMs,
    bodyTimeout: timeoutMs,
    signal,
    dispatcher: options.dispatcher,
  });

  if (method === 'HEAD') {
    await body.dump();
    return { body: '', status: statusCode, headers };
  }

  return {
    body: await body.text(),
    status: statusCode,
    headers,
  };
}

/** First value of a response header, lowercase name. */
export function headerValue(headers: HttpResult['headers'], name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}
