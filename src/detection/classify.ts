import type { AdSource } from '../types.js';
import { hostnameOf } from '../utils/url.js';

interface SitePattern {
  hostFragment: string;
  site: AdSource;
}

const SITE_PATTERNS: SitePattern[] = [
  { hostFragment: 'linkedin.com', site: 'linkedin' },
  { hostFragment: 'indeed.com', site: 'indeed' },
  { hostFragment: 'glassdoor.com', site: 'glassdoor' },
];

export function classifySite(rawUrl: string): AdSource {
  const host = hostnameOf(rawUrl);
  if (!host) {
    return 'generic';
  }
  return SITE_PATTERNS.find((pattern) => host.includes(pattern.hostFragment))?.site ?? 'generic';
}

export function isKnownSite(site: AdSource): boolean {
  return site !== 'generic';
}
