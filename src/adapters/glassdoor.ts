import { createSiteParser } from './common.js';
import type { SiteProfile } from './common.js';

export const GLASSDOOR_PROFILE: SiteProfile = {
  site: 'glassdoor',
  companySelectors: ['[data-test="employer-name"]', '.employerName', '.jobInfoItem.employer'],
  titleSelectors: ['h1[data-test="job-title"]', 'h1.jobTitle', '.jobTitle'],
  descriptionSelectors: ['[data-test="job-description"]', '.jobDescriptionContent', '#JobDescriptionContainer'],
};

export const parseGlassdoor = createSiteParser(GLASSDOOR_PROFILE);
