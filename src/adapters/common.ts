import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { createExtractionResult, hasMinimumData } from '../extraction/result.js';
import type { AdSource, ExtractionResult } from '../types.js';
import { htmlFragmentToText, isUsableValue, looksLikeHtml, normalizeMultiline, normalizeWhitespace } from '../utils/text.js';

export type SiteParser = (html: string, url: string) => ExtractionResult;

export interface HeuristicFields {
  company?: string;
  jobTitle?: string;
  jobDescription?: string;
  hiringManager?: string;
}

export interface TextRule {
  minLength: number;
  maxLength?: number;
  accept?: (text: string) => boolean;
}

export interface SiteProfile {
  site: AdSource;
  companySelectors: string[];
  titleSelectors: string[];
  descriptionSelectors: string[];
  hiringManagerSelectors?: string[];
  descriptionRule?: TextRule;
  refine?: ($: CheerioAPI, fields: HeuristicFields, profile: SiteProfile) => HeuristicFields;
}

export const COMPANY_RULE: TextRule = { minLength: 2, maxLength: 100 };
export const TITLE_RULE: TextRule = { minLength: 2, maxLength: 200 };
export const DESCRIPTION_RULE: TextRule = { minLength: 100 };

export const HIRING_MANAGER_MARKERS = ['meet the hiring team', 'hiring manager', 'recruiter'];

const NAME_PATTERN = /^[\s:|,–—-]*([A-Z][a-z]+(?:[ ][A-Z][a-z'-]+){1,3})(?![A-Za-z])/;
const NAME_STOP_WORDS = new Set([
  'About',
  'Apply',
  'Hiring',
  'Job',
  'Jobs',
  'Manager',
  'More',
  'Posted',
  'Recruiter',
  'See',
  'Show',
  'Sign',
  'Team',
  'The',
  'View',
]);

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJobPostingType(value: unknown): boolean {
  if (typeof value === 'string') {
    return value === 'JobPosting' || value.endsWith('/JobPosting') || value.endsWith(':JobPosting');
  }
  return Array.isArray(value) && value.some((entry) => isJobPostingType(entry));
}

function collectJobPostings(value: unknown, acc: JsonRecord[], depth = 0): void {
  if (depth > 4) {
    return;
  }
  if (Array.isArray(value)) {
    for (const entry of value) {
      collectJobPostings(entry, acc, depth + 1);
    }
    return;
  }
  if (!isRecord(value)) {
    return;
  }
  if (isJobPostingType(value['@type'])) {
    acc.push(value);
  }
  if (value['@graph'] !== undefined) {
    collectJobPostings(value['@graph'], acc, depth + 1);
  }
}

function organizationName(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return normalizeWhitespace(value) || undefined;
  }
  if (Array.isArray(value)) {
    return organizationName(value[0]);
  }
  if (isRecord(value) && typeof value.name === 'string') {
    return normalizeWhitespace(value.name) || undefined;
  }
  return undefined;
}

export function descriptionToText(raw: string): string {
  let value = raw;
  if (/&lt;|&gt;|&amp;|&#\d+;/.test(value)) {
    value = cheerio.load(value).root().text();
  }
  return looksLikeHtml(value) ? htmlFragmentToText(value) : normalizeMultiline(value);
}

function toFields(posting: JsonRecord): HeuristicFields {
  return {
    company: organizationName(posting.hiringOrganization),
    jobTitle: typeof posting.title === 'string' ? normalizeWhitespace(posting.title) || undefined : undefined,
    jobDescription: typeof posting.description === 'string' ? descriptionToText(posting.description) || undefined : undefined,
  };
}

/**
 * Reads every JSON-LD block and returns the first JobPosting carrying both an organization
 * and a description, or else the first partial one.
 */
export function readJsonLdJobPosting($: CheerioAPI): HeuristicFields | undefined {
  const postings: JsonRecord[] = [];
  $('script[type="application/ld+json"]').each((_, script) => {
    const raw = $(script).html();
    if (!raw || !raw.trim()) {
      return;
    }
    try {
      const parsed: unknown = JSON.parse(raw.trim());
      collectJobPostings(parsed, postings);
    } catch {
      // Malformed blocks are common on job boards; other blocks may still be valid.
    }
  });

  const candidates = postings.map(toFields);
  return candidates.find((fields) => hasMinimumData(fields)) ?? candidates[0];
}

export function passesRule(text: string, rule: TextRule): boolean {
  if (text.length < rule.minLength) {
    return false;
  }
  if (rule.maxLength !== undefined && text.length > rule.maxLength) {
    return false;
  }
  return rule.accept ? rule.accept(text) : true;
}

export function inlineText(fragment: string): string {
  return normalizeWhitespace(htmlFragmentToText(fragment));
}

export function firstSelectorText(
  $: CheerioAPI,
  selectors: string[],
  rule: TextRule,
  mode: 'inline' | 'block',
): string | undefined {
  for (const selector of selectors) {
    let found: string | undefined;
    $(selector).each((_, element) => {
      const fragment = $(element).html() ?? '';
      const text = mode === 'block' ? htmlFragmentToText(fragment) : inlineText(fragment);
      if (passesRule(text, rule)) {
        found = text;
        return false;
      }
      return undefined;
    });
    if (found) {
      return found;
    }
  }
  return undefined;
}

export function firstAttributeMatch(
  $: CheerioAPI,
  attribute: 'class' | 'id',
  pattern: RegExp,
  rule: TextRule,
  mode: 'inline' | 'block',
): string | undefined {
  let found: string | undefined;
  $(`[${attribute}]`).each((_, element) => {
    const node = $(element);
    if (!pattern.test(node.attr(attribute) ?? '')) {
      return undefined;
    }
    const fragment = node.html() ?? '';
    const text = mode === 'block' ? htmlFragmentToText(fragment) : inlineText(fragment);
    if (passesRule(text, rule)) {
      found = text;
      return false;
    }
    return undefined;
  });
  return found;
}

export function metaContent($: CheerioAPI, selector: string, rule: TextRule): string | undefined {
  const content = $(selector).first().attr('content');
  if (!content) {
    return undefined;
  }
  const text = descriptionToText(content);
  return passesRule(text, rule) ? text : undefined;
}

export function asPersonName(text: string): string | undefined {
  const match = NAME_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  const name = match[1];
  if (name.split(' ').some((word) => NAME_STOP_WORDS.has(word))) {
    return undefined;
  }
  return name;
}

/**
 * Looks for a capitalized two-to-four word name right after a hiring marker.
 */
export function findHiringManager(pageText: string, markers: string[] = HIRING_MANAGER_MARKERS): string {
  const lower = pageText.toLowerCase();
  for (const marker of markers) {
    let index = lower.indexOf(marker);
    while (index !== -1) {
      const following = pageText.slice(index + marker.length, index + marker.length + 80);
      const name = asPersonName(following);
      if (name) {
        return name;
      }
      index = lower.indexOf(marker, index + marker.length);
    }
  }
  return '';
}

function fillFromSelectors($: CheerioAPI, profile: SiteProfile, seed: HeuristicFields): HeuristicFields {
  const descriptionRule = profile.descriptionRule ?? DESCRIPTION_RULE;
  return {
    ...seed,
    company: seed.company ?? firstSelectorText($, profile.companySelectors, COMPANY_RULE, 'inline'),
    jobTitle: seed.jobTitle ?? firstSelectorText($, profile.titleSelectors, TITLE_RULE, 'inline'),
    jobDescription:
      seed.jobDescription ?? firstSelectorText($, profile.descriptionSelectors, descriptionRule, 'block'),
  };
}

function resolveHiringManager($: CheerioAPI, profile: SiteProfile, fields: HeuristicFields): string {
  if (isUsableValue(fields.hiringManager)) {
    return fields.hiringManager ?? '';
  }
  for (const selector of profile.hiringManagerSelectors ?? []) {
    const name = asPersonName(inlineText($(selector).first().html() ?? ''));
    if (name) {
      return name;
    }
  }
  return findHiringManager(htmlFragmentToText($('body').html() ?? $.html()));
}

/**
 * Builds a parser that tries JSON-LD first and falls back to the profile's ordered selectors.
 */
export function createSiteParser(profile: SiteProfile): SiteParser {
  return (html: string): ExtractionResult => {
    const $ = cheerio.load(html);
    const structured = readJsonLdJobPosting($);

    if (structured && hasMinimumData(structured)) {
      return createExtractionResult({
        ...structured,
        hiringManager: resolveHiringManager($, profile, structured),
        adSource: profile.site,
        method: 'structured-jsonld',
      });
    }

    let fields = fillFromSelectors($, profile, structured ?? {});
    if (profile.refine) {
      fields = profile.refine($, fields, profile);
    }

    return createExtractionResult({
      ...fields,
      hiringManager: resolveHiringManager($, profile, fields),
      adSource: profile.site,
      method: `heuristic-${profile.site}`,
    });
  };
}
