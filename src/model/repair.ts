import { AD_SOURCES } from '../types.js';
import type { AdSource } from '../types.js';
import { PLACEHOLDER } from '../utils/text.js';

export const TRUNCATION_MARKER = '\n\n[Description truncated]';

export interface ParsedModelFields {
  company: string;
  jobTitle: string;
  fullDescription: string;
  hiringManager: string;
  adSource: AdSource;
}

export interface ParsedModelResponse {
  fields: ParsedModelFields;
  recovered: boolean;
}

const DESCRIPTION_KEYS = ['full_description', 'jobDescription'];
const TITLE_KEYS = ['job_title', 'jobTitle'];

const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) {
    return trimmed;
  }
  return trimmed
    .replace(/^```(?:json)?[ \t]*\n?/i, '')
    .replace(/\n?```\s*$/, '')
    .trim();
}

function precedingBackslashes(value: string, index: number): number {
  let count = 0;
  for (let i = index - 1; i >= 0 && value[i] === '\\'; i -= 1) {
    count += 1;
  }
  return count;
}

/** Drops a trailing lone backslash or an unfinished `\u` escape. */
export function stripIncompleteEscape(value: string): string {
  const unicode = /\\u[0-9a-fA-F]{0,3}$/.exec(value);
  if (unicode && precedingBackslashes(value, unicode.index) % 2 === 0) {
    return value.slice(0, unicode.index);
  }
  return precedingBackslashes(value, value.length) % 2 === 1 ? value.slice(0, -1) : value;
}

function escapeForJson(value: string): string {
  return JSON.stringify(value).slice(1, -1);
}

interface ScanState {
  inString: boolean;
  stringStart: number;
  openers: string[];
}

function scanJson(text: string): ScanState {
  const state: ScanState = { inString: false, stringStart: -1, openers: [] };
  let escaped = false;

  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];
    if (state.inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        state.inString = false;
      }
      continue;
    }
    if (char === '"') {
      state.inString = true;
      state.stringStart = i;
    } else if (char === '{' || char === '[') {
      state.openers.push(char);
    } else if (char === '}' || char === ']') {
      state.openers.pop();
    }
  }
  return state;
}

/**
 * Closes a string value cut off by the token limit, then every container still open.
 * Returns undefined when the text does not end inside a `"key": "...` value.
 */
export function closeDanglingString(text: string): string | undefined {
  const state = scanJson(text);
  if (!state.inString) {
    return undefined;
  }

  const keyMatch = /"((?:[^"\\]|\\.)*)"\s*:\s*$/.exec(text.slice(0, state.stringStart));
  if (!keyMatch) {
    return undefined;
  }

  const marker = DESCRIPTION_KEYS.includes(keyMatch[1]) ? escapeForJson(TRUNCATION_MARKER) : '';
  const closers = [...state.openers]
    .reverse()
    .map((opener) => (opener === '{' ? '}' : ']'))
    .join('');

  return `${stripIncompleteEscape(text)}${marker}"${closers}`;
}

function decodeByHand(raw: string): string {
  return raw.replace(/\\(u[0-9a-fA-F]{4}|["\\/bfnrt])/g, (_, code: string) => {
    if (code.startsWith('u')) {
      return String.fromCharCode(Number.parseInt(code.slice(1), 16));
    }
    return SIMPLE_ESCAPES[code] ?? code;
  });
}

/** Decodes the body of a JSON string literal, falling back to hand-coded replacements. */
export function decodeJsonString(raw: string): string {
  try {
    const decoded: unknown = JSON.parse(`"${raw}"`);
    if (typeof decoded === 'string') {
      return decoded;
    }
  } catch {
    // Raw control characters or stray escapes; handled below.
  }
  return decodeByHand(raw);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const QUOTED_VALUE = '"((?:[^"\\\\]|\\\\.)*)"';

// A stray unescaped quote inside the value does not end it; only a quote followed by `,` or `}` does.
const DELIMITED_VALUE = '"((?:[^"\\\\]|\\\\.|"(?!\\s*[,}]))*)"(?=\\s*[,}])';

function completeValue(text: string, keys: string[], valuePattern = QUOTED_VALUE): string | undefined {
  for (const key of keys) {
    const match = new RegExp(`"${escapeRegExp(key)}"\\s*:\\s*${valuePattern}`).exec(text);
    if (match) {
      return decodeJsonString(match[1]);
    }
  }
  return undefined;
}

function partialValue(text: string, keys: string[]): string | undefined {
  for (const key of keys) {
    const match = new RegExp(`"${escapeRegExp(key)}"\\s*:\\s*"([\\s\\S]*)$`).exec(text);
    if (match) {
      return decodeJsonString(stripIncompleteEscape(match[1])) + TRUNCATION_MARKER;
    }
  }
  return undefined;
}

function toAdSource(value: string | undefined): AdSource {
  const normalized = value?.trim().toLowerCase();
  return AD_SOURCES.find((source) => source === normalized) ?? 'generic';
}

function buildFields(values: {
  company?: string;
  jobTitle?: string;
  fullDescription?: string;
  hiringManager?: string;
  adSource?: string;
}): ParsedModelFields {
  return {
    company: values.company || PLACEHOLDER,
    jobTitle: values.jobTitle || PLACEHOLDER,
    fullDescription: values.fullDescription || PLACEHOLDER,
    hiringManager: values.hiringManager ?? '',
    adSource: toAdSource(values.adSource),
  };
}

/** Pulls individual fields out of text that is not valid JSON. */
export function recoverFields(text: string): ParsedModelFields | undefined {
  const values = {
    company: completeValue(text, ['company']),
    jobTitle: completeValue(text, TITLE_KEYS),
    fullDescription:
      completeValue(text, DESCRIPTION_KEYS, DELIMITED_VALUE) ?? partialValue(text, DESCRIPTION_KEYS),
    hiringManager: completeValue(text, ['hiring_manager']),
    adSource: completeValue(text, ['ad_source']),
  };
  if (Object.values(values).every((value) => value === undefined)) {
    return undefined;
  }
  return buildFields(values);
}

function stringField(record: Record<string, unknown>, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

function parseObject(text: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch {
    // Not JSON; the caller falls back to field recovery.
  }
  return undefined;
}

export function parseModelResponse(text: string, truncated: boolean): ParsedModelResponse | undefined {
  const cleaned = stripCodeFence(text);

  let candidate = cleaned;
  let repaired = false;
  if (truncated) {
    const closed = closeDanglingString(cleaned);
    if (closed !== undefined) {
      candidate = closed;
      repaired = true;
    }
  }

  const record = parseObject(candidate);
  if (record) {
    return {
      fields: buildFields({
        company: stringField(record, ['company']),
        jobTitle: stringField(record, TITLE_KEYS),
        fullDescription: stringField(record, DESCRIPTION_KEYS),
        hiringManager: stringField(record, ['hiring_manager']),
        adSource: stringField(record, ['ad_source']),
      }),
      recovered: repaired,
    };
  }

  const recovered = recoverFields(cleaned);
  return recovered ? { fields: recovered, recovered: true } : undefined;
}
