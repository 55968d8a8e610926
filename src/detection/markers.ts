export const JOB_CONTENT_MARKERS = [
  'job description',
  'job title',
  'apply now',
  'job posting',
  'hiring',
  'qualifications',
  'responsibilities',
  'requirements',
  'jobsearch-jobdescriptiontext',
  'job-poster-name',
  'job-title',
  'jobsearch-jobinfobullet',
];

export const STRONG_CAPTCHA_MARKERS = [
  'recaptcha',
  'hcaptcha',
  'cf-browser-verification',
  'cf-challenge',
  'challenge-platform',
  'verify you are human',
  "verify you're human",
  'just a moment',
  'checking your browser',
  'challenge-form',
  'turnstile',
  'access denied',
  'unusual traffic',
  "verify you're not a robot",
  'indeed.com/access-denied',
  'indeed.com/verify',
];

export const STRUCTURAL_CAPTCHA_PATTERNS: RegExp[] = [
  /<iframe[^>]*recaptcha/,
  /<div[^>]*recaptcha/,
  /<iframe[^>]*hcaptcha/,
  /<div[^>]*hcaptcha/,
  /data-sitekey/,
  /data-callback[^>]*captcha/,
];

export const WEAK_CAPTCHA_MARKERS = [
  'captcha',
  'cloudflare',
  'human verification',
  'please verify',
  'security check',
  'ddos protection',
  'ray id',
  'cf-ray',
  'bot detection',
  'security verification',
];

/** Phrases that make a hostile status code read as a verification page even without vendor markers. */
export const SECURITY_PHRASES = ['access denied', 'unusual traffic', 'verify', 'security'];

export function findMarker(lowerHtml: string, markers: readonly string[]): string | undefined {
  return markers.find((marker) => lowerHtml.includes(marker));
}

export function hasJobContent(html: string): boolean {
  return findMarker(html.toLowerCase(), JOB_CONTENT_MARKERS) !== undefined;
}
