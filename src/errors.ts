/** Rejected before any request is made: bad login, inverted range, negative values. */
export class InvalidInputError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export class PlaylistParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PlaylistParseError';
  }
}

/** A hint page was fetched but did not contain what the adapter looks for. */
export class HintSourceError extends Error {
  constructor(
    message: string,
    readonly sourceId: string,
  ) {
    super(message);
    this.name = 'HintSourceError';
  }
}

export class UnsupportedUrlError extends InvalidInputError {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedUrlError';
  }
}

export class TwitchApiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TwitchApiError';
  }
}

export class HttpStatusError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
  ) {
    super(`${url} returned HTTP ${status}`);
    this.name = 'HttpStatusError';
  }
}
