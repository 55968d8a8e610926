import type { AdSource, ExtractionResult } from '../types.js';
import { PLACEHOLDER, isUsableValue } from '../utils/text.js';

export interface ExtractionFields {
  company?: string;
  jobTitle?: string;
  jobDescription?: string;
  hiringManager?: string;
  adSource: AdSource;
  method: string;
}

export function hasMinimumData(result: Pick<ExtractionResult, 'company' | 'jobDescription'>): boolean {
  return isUsableValue(result.company) && isUsableValue(result.jobDescription);
}

function cleanField(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * The only way results are built, so `isComplete` always agrees with `hasMinimumData`.
 */
export function createExtractionResult(fields: ExtractionFields): ExtractionResult {
  const company = cleanField(fields.company);
  const jobDescription = cleanField(fields.jobDescription);
  return Object.freeze({
    company,
    jobTitle: cleanField(fields.jobTitle),
    jobDescription,
    hiringManager: cleanField(fields.hiringManager) ?? '',
    adSource: fields.adSource,
    method: fields.method,
    isComplete: hasMinimumData({ company, jobDescription }),
  });
}

export function emptyResult(adSource: AdSource, method: string): ExtractionResult {
  return createExtractionResult({ adSource, method });
}

function pick(preferred: string | undefined, fallback: string | undefined): string | undefined {
  if (isUsableValue(preferred)) {
    return preferred;
  }
  return isUsableValue(fallback) ? fallback : preferred ?? fallback;
}

function contributes(result: ExtractionResult): boolean {
  return (
    isUsableValue(result.company) ||
    isUsableValue(result.jobTitle) ||
    isUsableValue(result.jobDescription) ||
    result.hiringManager.length > 0
  );
}

/**
 * Merges a structured/heuristic result with a model-assisted one. Model fields win when
 * they hold real values: the model reads collapsed "show more" text that static parsing misses.
 */
export function mergeResults(
  structured: ExtractionResult | undefined,
  model: ExtractionResult | undefined,
): ExtractionResult | undefined {
  if (!structured || !model) {
    return model ?? structured;
  }

  const method = contributes(model) || !contributes(structured) ? model.method : structured.method;

  return createExtractionResult({
    company: pick(model.company, structured.company),
    jobTitle: pick(model.jobTitle, structured.jobTitle),
    jobDescription: pick(model.jobDescription, structured.jobDescription),
    hiringManager: model.hiringManager || structured.hiringManager,
    adSource: structured.adSource,
    method,
  });
}

export function displayValue(value: string | undefined): string {
  return value !== undefined && isUsableValue(value) ? value.trim() : PLACEHOLDER;
}
