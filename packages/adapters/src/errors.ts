export type AdapterErrorCode = 'OEM_PARSE' | 'FEED_FETCH';

export class OemParseError extends Error {
  readonly code = 'OEM_PARSE' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(`OEM parse error: ${message}`, options);
    this.name = 'OemParseError';
  }
}

export class FeedFetchError extends Error {
  readonly code = 'FEED_FETCH' as const;

  constructor(
    readonly url: string,
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(`failed to fetch OEM feed from ${url} after ${attempts} attempt(s)`, options);
    this.name = 'FeedFetchError';
  }
}
