import * as cheerio from 'cheerio';

export const PLACEHOLDER = 'Not specified';

const BLOCK_SELECTOR = 'p,div,li,ul,ol,section,article,h1,h2,h3,h4,h5,h6,tr,table,blockquote,pre';

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Collapses runs of spaces inside each line and drops blank lines, keeping line structure.
 */
export function normalizeMultiline(value: string): string {
  return value
    .replace(/\r/g, '')
    .split('\n')
    .map((line) => line.replace(/[ \t\u00a0]+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

export function looksLikeHtml(value: string): boolean {
  return /<[a-z][a-z0-9]*(\s[^>]*)?\/?>/i.test(value);
}

export function htmlFragmentToText(fragment: string): string {
  const $ = cheerio.load(fragment);
  $('script,style,noscript,template').remove();
  $('br').replaceWith('\n');
  $(BLOCK_SELECTOR).each((_, element) => {
    $(element).append('\n');
  });
  return normalizeMultiline($.root().text());
}

export function isUsableValue(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 && trimmed !== PLACEHOLDER;
}

export function countWords(value: string): number {
  return value.split(/\s+/).filter(Boolean).length;
}

export function byteLength(value: string): number {
  return Buffer.byteLength(value, 'utf8');
}
