import { createSiteParser } from './common.js';
import type { SiteProfile } from './common.js';

export const INDEED_PROFILE: SiteProfile = {
  site: 'indeed',
  companySelectors: [
    '[data-testid="inlineHeader-companyName"]',
    '[data-testid="job-poster-name"]',
    'a[data-testid="company-name"]',
    '[data-company-name="true"]',
    '.jobsearch-InlineCompanyRating',
  ],
  titleSelectors: [
    'h1[data-testid="jobsearch-JobInfoHeader-title"]',
    'h1[data-testid="job-title"]',
    'h1.jobTitle',
    '.jobsearch-JobInfoHeader-title',
  ],
  descriptionSelectors: ['#jobDescriptionText', '[data-testid="job-description"]', '.jobsearch-jobDescriptionText'],
};

export const parseIndeed = createSiteParser(INDEED_PROFILE);
