import type { CheerioAPI } from 'cheerio';
import {
  COMPANY_RULE,
  DESCRIPTION_RULE,
  TITLE_RULE,
  createSiteParser,
  firstAttributeMatch,
  firstSelectorText,
  metaContent,
} from './common.js';
import type { HeuristicFields, SiteProfile } from './common.js';

function fromMetadata($: CheerioAPI, fields: HeuristicFields): HeuristicFields {
  return {
    ...fields,
    company:
      fields.company ??
      metaContent($, 'meta[property="og:company"]', COMPANY_RULE) ??
      metaContent($, 'meta[name="company"]', COMPANY_RULE) ??
      metaContent($, 'meta[name="organization"]', COMPANY_RULE),
    jobTitle:
      fields.jobTitle ??
      metaContent($, 'meta[property="og:title"]', TITLE_RULE) ??
      metaContent($, 'meta[name="title"]', TITLE_RULE) ??
      firstSelectorText($, ['title'], TITLE_RULE, 'inline'),
    jobDescription:
      fields.jobDescription ??
      metaContent($, 'meta[property="og:description"]', DESCRIPTION_RULE) ??
      metaContent($, 'meta[name="description"]', DESCRIPTION_RULE),
  };
}

function fromPageStructure($: CheerioAPI, fields: HeuristicFields): HeuristicFields {
  return {
    ...fields,
    company:
      fields.company ??
      firstAttributeMatch($, 'class', /company|employer|organization/i, COMPANY_RULE, 'inline'),
    jobTitle:
      fields.jobTitle ??
      firstSelectorText($, ['h1'], TITLE_RULE, 'inline') ??
      firstAttributeMatch($, 'class', /job.*title|position/i, TITLE_RULE, 'inline'),
    jobDescription:
      fields.jobDescription ??
      firstAttributeMatch($, 'id', /description/i, DESCRIPTION_RULE, 'block') ??
      firstAttributeMatch($, 'class', /description/i, DESCRIPTION_RULE, 'block') ??
      firstSelectorText($, ['main', 'article'], DESCRIPTION_RULE, 'block'),
  };
}

export const GENERIC_PROFILE: SiteProfile = {
  site: 'generic',
  companySelectors: [],
  titleSelectors: [],
  descriptionSelectors: [],
  refine: ($, fields) => fromPageStructure($, fromMetadata($, fields)),
};

export const parseGeneric = createSiteParser(GENERIC_PROFILE);
