/**
 * Thrown by the analyzer before any I/O when the URL does not use an accepted scheme.
 */
export class InvalidUrlError extends Error {
  constructor(public readonly url: string) {
    super('Invalid URL format. URL must start with http:// or https://');
    this.name = 'InvalidUrlError';
  }
}

export class HttpTimeoutError extends Error {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number,
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'HttpTimeoutError';
  }
}

export class RequestCancelledError extends Error {
  constructor(public readonly url: string) {
    super(`Request to ${url} was cancelled`);
    this.name = 'RequestCancelledError';
  }
}

export class TooManyRedirectsError extends Error {
  constructor(public readonly url: string) {
    super(`Too many redirects for ${url}`);
    this.name = 'TooManyRedirectsError';
  }
}
