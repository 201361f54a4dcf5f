export type StatusClass = 'ok' | 'miss' | 'transient';

/**
 * 200 is the only success. 403/404 (and other 4xx) mean the host does not
 * have the candidate; 429 and 5xx say nothing about the candidate itself.
 */
export function classifyStatus(status: number): StatusClass {
  if (status === 200) return 'ok';
  if (status === 429 || status >= 500) return 'transient';
  return 'miss';
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : null;
    return code ? `${code}: ${err.message}` : err.message;
  }
  return String(err);
}
