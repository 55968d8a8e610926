import { detectCaptcha } from '../detection/captcha.js';
import { isKnownSite } from '../detection/classify.js';
import { SECURITY_PHRASES, findMarker, hasJobContent } from '../detection/markers.js';
import { HttpTimeoutError, RequestCancelledError } from '../errors.js';
import type { AdSource, FetchOutcome, FetchResult } from '../types.js';
import { HttpClient } from '../utils/http.js';

export interface FetchPageOptions {
  site: AdSource;
  timeoutMs?: number;
  signal?: AbortSignal;
}

const HOSTILE_STATUSES = new Set([403, 429, 503]);

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function classifyHostileResponse(html: string, status: number, site: AdSource): FetchOutcome {
  if (hasJobContent(html)) {
    return { html, captchaDetected: false, status };
  }

  if (detectCaptcha(html).blocked) {
    return { html, captchaDetected: true, status };
  }

  if (findMarker(html.toLowerCase(), SECURITY_PHRASES) || isKnownSite(site)) {
    return { html, captchaDetected: true, status };
  }

  return { error: `HTTP ${status}`, failure: 'http', status };
}

/**
 * Fetches raw markup for one posting. Never throws: every failure comes back as a typed outcome.
 */
export async function fetchPage(
  url: string,
  httpClient: HttpClient,
  options: FetchPageOptions,
): Promise<FetchOutcome> {
  let response: FetchResult;
  try {
    response = await httpClient.get(url, {
      timeoutMs: options.timeoutMs ?? 10000,
      signal: options.signal,
    });
  } catch (error) {
    if (error instanceof HttpTimeoutError) {
      return { error: 'Request timeout', failure: 'timeout' };
    }
    if (error instanceof RequestCancelledError) {
      return { error: 'Request cancelled', failure: 'cancelled' };
    }
    return { error: `Failed to fetch URL: ${describeError(error)}`, failure: 'network' };
  }

  const { status, body } = response;

  if (status >= 200 && status < 300) {
    return { html: body, captchaDetected: detectCaptcha(body).blocked, status };
  }

  if (HOSTILE_STATUSES.has(status)) {
    return classifyHostileResponse(body, status, options.site);
  }

  if (detectCaptcha(body).blocked) {
    return { html: body, captchaDetected: true, status };
  }

  return { error: `HTTP ${status}`, failure: 'http', status };
}
