import { describe, expect, it } from 'vitest';
import { classifySite, isKnownSite } from '../src/detection/classify.js';

describe('classifySite', () => {
  it('maps job board hosts to their source', () => {
    expect(classifySite('https://www.linkedin.com/jobs/view/123')).toBe('linkedin');
    expect(classifySite('https://uk.indeed.com/viewjob?jk=abc')).toBe('indeed');
    expect(classifySite('https://www.glassdoor.com/job-listing/x')).toBe('glassdoor');
  });

  it('ignores case in the host', () => {
    expect(classifySite('HTTPS://WWW.LINKEDIN.COM/jobs/view/1')).toBe('linkedin');
  });

  it('falls back to generic for other hosts and unparseable input', () => {
    expect(classifySite('https://careers.example.com/jobs/42')).toBe('generic');
    expect(classifySite('not a url')).toBe('generic');
    expect(classifySite('')).toBe('generic');
  });

  it('only looks at the host, not the path', () => {
    expect(classifySite('https://example.com/redirect?to=linkedin.com')).toBe('generic');
  });
});

describe('isKnownSite', () => {
  it('treats every named board as known', () => {
    expect(isKnownSite('indeed')).toBe(true);
    expect(isKnownSite('generic')).toBe(false);
  });
});
