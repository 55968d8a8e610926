import { describe, expect, it } from 'vitest';
import {
  createExtractionResult,
  displayValue,
  emptyResult,
  hasMinimumData,
  mergeResults,
} from '../src/extraction/result.js';

describe('hasMinimumData', () => {
  it('needs both a company and a description', () => {
    expect(hasMinimumData({ company: 'Acme', jobDescription: 'Build things.' })).toBe(true);
    expect(hasMinimumData({ company: 'Acme' })).toBe(false);
    expect(hasMinimumData({ jobDescription: 'Build things.' })).toBe(false);
  });

  it('rejects placeholders and blank values', () => {
    expect(hasMinimumData({ company: 'Not specified', jobDescription: 'Build things.' })).toBe(false);
    expect(hasMinimumData({ company: 'Acme', jobDescription: '   ' })).toBe(false);
  });
});

describe('createExtractionResult', () => {
  it('trims fields, defaults the hiring manager and freezes the value', () => {
    const result = createExtractionResult({
      company: '  Acme ',
      jobDescription: 'Build things.',
      adSource: 'generic',
      method: 'heuristic-generic',
    });

    expect(result).toEqual({
      company: 'Acme',
      jobTitle: undefined,
      jobDescription: 'Build things.',
      hiringManager: '',
      adSource: 'generic',
      method: 'heuristic-generic',
      isComplete: true,
    });
    expect(Object.isFrozen(result)).toBe(true);
  });
});

describe('mergeResults', () => {
  const heuristic = createExtractionResult({
    company: 'Acme',
    jobTitle: 'Engineer',
    jobDescription: 'Short description.',
    hiringManager: 'Jane Doe',
    adSource: 'indeed',
    method: 'heuristic-indeed',
  });

  it('prefers real model values and keeps the rest', () => {
    const model = createExtractionResult({
      company: 'Not specified',
      jobDescription: 'A much longer description from the expanded section.',
      adSource: 'generic',
      method: 'model-assisted',
    });

    expect(mergeResults(heuristic, model)).toEqual({
      company: 'Acme',
      jobTitle: 'Engineer',
      jobDescription: 'A much longer description from the expanded section.',
      hiringManager: 'Jane Doe',
      adSource: 'indeed',
      method: 'model-assisted',
      isComplete: true,
    });
  });

  it('keeps the heuristic method when the model added nothing', () => {
    expect(mergeResults(heuristic, emptyResult('indeed', 'model-assisted-timeout'))?.method).toBe('heuristic-indeed');
  });

  it('returns whichever side exists', () => {
    expect(mergeResults(undefined, heuristic)).toBe(heuristic);
    expect(mergeResults(heuristic, undefined)).toBe(heuristic);
    expect(mergeResults(undefined, undefined)).toBeUndefined();
  });
});

describe('displayValue', () => {
  it('renders missing values as the placeholder', () => {
    expect(displayValue(undefined)).toBe('Not specified');
    expect(displayValue('')).toBe('Not specified');
    expect(displayValue(' Acme ')).toBe('Acme');
  });
});
