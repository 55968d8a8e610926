import type { CheerioAPI } from 'cheerio';
import { countWords, htmlFragmentToText } from '../utils/text.js';
import { createSiteParser, passesRule } from './common.js';
import type { HeuristicFields, SiteProfile, TextRule } from './common.js';

const LINKEDIN_DESCRIPTION_RULE: TextRule = {
  minLength: 100,
  accept: (text) => /[.!?]/.test(text) || countWords(text) > 30,
};

/** Reads the block that follows the "About the job" heading. */
function aboutTheJob($: CheerioAPI): string | undefined {
  const headings = $('h2, h3, h4').filter((_, element) => /about the job/i.test($(element).text()));

  let found: string | undefined;
  headings.each((_, element) => {
    const heading = $(element);
    const candidates = [
      heading.nextAll('div, section').first(),
      heading.parent().find('[class*="description"], [class*="content"], [class*="text"]').first(),
      heading.parent().nextAll('div, section').first(),
    ];
    for (const candidate of candidates) {
      const text = htmlFragmentToText(candidate.html() ?? '');
      if (passesRule(text, LINKEDIN_DESCRIPTION_RULE)) {
        found = text;
        return false;
      }
    }
    return undefined;
  });
  return found;
}

function refineLinkedIn($: CheerioAPI, fields: HeuristicFields): HeuristicFields {
  if (fields.jobDescription) {
    return fields;
  }
  return { ...fields, jobDescription: aboutTheJob($) };
}

export const LINKEDIN_PROFILE: SiteProfile = {
  site: 'linkedin',
  companySelectors: [
    '.topcard__org-name-link',
    '[data-testid="job-poster-name"]',
    'a[data-tracking-control-name="public_jobs_topcard-org-name"]',
    '.job-details-jobs-unified-top-card__company-name',
    '.jobs-unified-top-card__company-name',
  ],
  titleSelectors: [
    'h1.top-card-layout__title',
    'h1.topcard__title',
    'h1.job-title',
    'h1[data-testid="job-title"]',
    '.jobs-unified-top-card__job-title',
  ],
  descriptionSelectors: [
    '.show-more-less-html__markup',
    '[data-testid="job-description"]',
    '.jobs-description-content__text',
    '.jobs-box__html-content',
    '.jobs-description__text',
    'section[aria-labelledby*="job-details"]',
    'div[data-testid="job-details"]',
    '.description__text',
    '#job-details',
  ],
  hiringManagerSelectors: [
    '.hirer-card__hirer-information .jobs-poster__name',
    '.message-the-recruiter .base-main-card__title',
    '.hirer-card__hirer-information a',
  ],
  descriptionRule: LINKEDIN_DESCRIPTION_RULE,
  refine: refineLinkedIn,
};

export const parseLinkedIn = createSiteParser(LINKEDIN_PROFILE);
