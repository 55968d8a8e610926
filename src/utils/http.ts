import { HttpTimeoutError, RequestCancelledError, TooManyRedirectsError } from '../errors.js';
import type { FetchResult } from '../types.js';
import { toAbsoluteUrl } from './url.js';

export interface RequestOptions {
  timeoutMs?: number;
  maxBytes?: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

export const BROWSER_HEADERS: Record<string, string> = {
  'user-agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'accept-language': 'en-US,en;q=0.5',
  'upgrade-insecure-requests': '1',
};

const MAX_REDIRECTS = 8;

function normalizeHeaders(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    out[key.toLowerCase()] = value;
  });
  return out;
}

function mergeHeaders(...headersList: Array<Record<string, string> | undefined>): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const headers of headersList) {
    if (!headers) {
      continue;
    }
    for (const [key, value] of Object.entries(headers)) {
      merged[key.toLowerCase()] = value;
    }
  }
  return merged;
}

/**
 * Single-shot GET client. One instance is shared by the process; it holds no per-request state.
 */
export class HttpClient {
  private readonly defaultTimeoutMs: number;

  constructor(defaultTimeoutMs = 10000) {
    this.defaultTimeoutMs = defaultTimeoutMs;
  }

  /** `timeoutMs` covers the whole redirect chain, not each hop. */
  async get(rawUrl: string, options: RequestOptions = {}): Promise<FetchResult> {
    let currentUrl = rawUrl.trim();
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const deadline = Date.now() + timeoutMs;

    for (let hop = 0; hop <= MAX_REDIRECTS; hop += 1) {
      const remainingMs = deadline - Date.now();
      if (remainingMs <= 0) {
        throw new HttpTimeoutError(currentUrl, timeoutMs);
      }
      const response = await this.performFetch(currentUrl, options, remainingMs, timeoutMs);
      const location = response.headers.location;
      if (location && response.status >= 300 && response.status < 400) {
        currentUrl = toAbsoluteUrl(location, currentUrl);
        continue;
      }

      return response;
    }

    throw new TooManyRedirectsError(rawUrl);
  }

  private async performFetch(
    url: string,
    options: RequestOptions,
    remainingMs: number,
    timeoutMs: number,
  ): Promise<FetchResult> {
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, remainingMs);

    const callerSignal = options.signal;
    const onCallerAbort = (): void => controller.abort();
    if (callerSignal) {
      if (callerSignal.aborted) {
        clearTimeout(timeout);
        throw new RequestCancelledError(url);
      }
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }

    try {
      const response = await fetch(url, {
        method: 'GET',
        redirect: 'manual',
        signal: controller.signal,
        headers: mergeHeaders(BROWSER_HEADERS, options.headers),
      });

      const headers = normalizeHeaders(response.headers);
      const contentType = headers['content-type'] ?? '';

      const text = await response.text();
      const maxBytes = options.maxBytes ?? 5_000_000;
      const body = text.length > maxBytes ? text.slice(0, maxBytes) : text;

      return {
        status: response.status,
        url: response.url || url,
        headers,
        body,
        contentType,
      };
    } catch (error) {
      if (timedOut) {
        throw new HttpTimeoutError(url, timeoutMs);
      }
      if (callerSignal?.aborted) {
        throw new RequestCancelledError(url);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }
}
