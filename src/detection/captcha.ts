import {
  JOB_CONTENT_MARKERS,
  STRONG_CAPTCHA_MARKERS,
  STRUCTURAL_CAPTCHA_PATTERNS,
  WEAK_CAPTCHA_MARKERS,
  findMarker,
} from './markers.js';

export type CaptchaReason = 'job-content' | 'strong-marker' | 'structural-pattern' | 'weak-marker' | 'none';

export interface CaptchaVerdict {
  blocked: boolean;
  reason: CaptchaReason;
  signal?: string;
}

/**
 * Layered check. Job content wins over every CAPTCHA artifact: a solved challenge
 * often leaves its widget markup in the page next to the real posting.
 */
export function detectCaptcha(html: string): CaptchaVerdict {
  if (!html) {
    return { blocked: false, reason: 'none' };
  }

  const lower = html.toLowerCase();

  const contentMarker = findMarker(lower, JOB_CONTENT_MARKERS);
  if (contentMarker) {
    return { blocked: false, reason: 'job-content', signal: contentMarker };
  }

  const strongMarker = findMarker(lower, STRONG_CAPTCHA_MARKERS);
  if (strongMarker) {
    return { blocked: true, reason: 'strong-marker', signal: strongMarker };
  }

  const pattern = STRUCTURAL_CAPTCHA_PATTERNS.find((candidate) => candidate.test(lower));
  if (pattern) {
    return { blocked: true, reason: 'structural-pattern', signal: pattern.source };
  }

  const weakMarker = findMarker(lower, WEAK_CAPTCHA_MARKERS);
  if (weakMarker) {
    return { blocked: true, reason: 'weak-marker', signal: weakMarker };
  }

  return { blocked: false, reason: 'none' };
}

export function isCaptchaPage(html: string): boolean {
  return detectCaptcha(html).blocked;
}
