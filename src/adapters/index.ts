import type { AdSource, ExtractionResult } from '../types.js';
import type { SiteParser } from './common.js';
import { parseGeneric } from './generic.js';
import { parseGlassdoor } from './glassdoor.js';
import { parseIndeed } from './indeed.js';
import { parseLinkedIn } from './linkedin.js';

export type { SiteParser } from './common.js';

const PARSER_BY_SITE: Record<AdSource, SiteParser> = {
  linkedin: parseLinkedIn,
  indeed: parseIndeed,
  glassdoor: parseGlassdoor,
  generic: parseGeneric,
};

export function parserFor(site: AdSource): SiteParser {
  return PARSER_BY_SITE[site];
}

export function parseJobPage(html: string, url: string, site: AdSource): ExtractionResult {
  return parserFor(site)(html, url);
}
