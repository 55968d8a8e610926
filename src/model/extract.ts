import { createExtractionResult, emptyResult } from '../extraction/result.js';
import type { QuotaNotifier } from '../notify/quotaAlert.js';
import type { AdSource, ExtractionResult, ModelCallOutcome } from '../types.js';
import type { Logger } from '../utils/logger.js';
import type { ModelClient } from './client.js';
import { buildExtractionMessages } from './prompt.js';
import { parseModelResponse } from './repair.js';

export interface ModelExtractionDeps {
  client?: ModelClient;
  notifier?: QuotaNotifier;
  logger: Logger;
  model: string;
  maxHtmlChars: number;
}

export interface ModelExtractionOptions {
  url: string;
  site: AdSource;
  signal?: AbortSignal;
}

type FailedCall = Exclude<ModelCallOutcome, { kind: 'ok' | 'truncated' }>;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function sendQuotaAlert(
  notifier: QuotaNotifier,
  deps: ModelExtractionDeps,
  message: string,
  url: string,
): Promise<void> {
  const result = await notifier.notifyQuotaExceeded({
    model: deps.model,
    message,
    url,
    occurredAt: new Date().toISOString(),
  });
  if (!result.sent) {
    await deps.logger.warn(`Quota alert not sent: ${result.reason ?? 'unknown reason'}`);
  }
}

/** Fire-and-forget. Neither the alert nor the logging of its failure may reject. */
function alertOperator(deps: ModelExtractionDeps, message: string, url: string): void {
  const { notifier, logger } = deps;
  if (!notifier) {
    return;
  }
  void sendQuotaAlert(notifier, deps, message, url)
    .catch((error: unknown) => logger.error(`Quota alert failed: ${describeError(error)}`))
    .catch((error: unknown) => {
      console.error(`Quota alert failed and could not be logged: ${describeError(error)}`);
    });
}

async function failureResult(
  outcome: FailedCall,
  deps: ModelExtractionDeps,
  { url, site }: ModelExtractionOptions,
): Promise<ExtractionResult> {
  const { logger } = deps;
  switch (outcome.kind) {
    case 'quota_exceeded':
      await logger.error(`Model quota exceeded: ${outcome.message}`);
      alertOperator(deps, outcome.message, url);
      return emptyResult(site, 'model-assisted-quota-exceeded');
    case 'unavailable':
      await logger.error(`Model unavailable: ${outcome.reason}`);
      return emptyResult(site, 'model-assisted-unavailable');
    case 'timeout':
      await logger.warn(`Model call timed out: ${outcome.message}`);
      return emptyResult(site, 'model-assisted-timeout');
    case 'cancelled':
      await logger.warn('Model call cancelled');
      return emptyResult(site, 'model-assisted-cancelled');
    case 'failed':
      await logger.error(`Model call failed: ${outcome.message}`);
      return emptyResult(site, 'model-assisted-error');
  }
}

/**
 * Asks the model for the five posting fields. Provider failures come back as results
 * tagged with a `model-assisted-*` method, never as exceptions.
 */
export async function extractWithModel(
  html: string,
  deps: ModelExtractionDeps,
  options: ModelExtractionOptions,
): Promise<ExtractionResult> {
  const { client, logger } = deps;
  const { url, site, signal } = options;

  if (!client) {
    await logger.warn('Model extraction skipped: no API key configured');
    return emptyResult(site, 'model-assisted-unavailable');
  }

  const input = html.slice(0, deps.maxHtmlChars);
  if (input.length < html.length) {
    await logger.info(`Model input cut from ${html.length} to ${input.length} characters`);
  }

  const outcome = await client.complete(buildExtractionMessages(url, input), { signal });
  if (outcome.kind !== 'ok' && outcome.kind !== 'truncated') {
    return failureResult(outcome, deps, options);
  }

  const truncated = outcome.kind === 'truncated';
  if (truncated) {
    await logger.warn(`Model response hit the completion limit (${outcome.text.length} characters)`);
  }

  const parsed = parseModelResponse(outcome.text, truncated);
  if (!parsed) {
    await logger.error(`Model response could not be parsed: ${outcome.text.slice(0, 200)}`);
    return emptyResult(site, 'model-assisted-error');
  }

  const { fields, recovered } = parsed;
  if (recovered) {
    await logger.warn('Model response repaired before use');
  }

  return createExtractionResult({
    company: fields.company,
    jobTitle: fields.jobTitle,
    jobDescription: fields.fullDescription,
    hiringManager: fields.hiringManager,
    adSource: fields.adSource,
    method: recovered ? 'model-assisted-recovered' : 'model-assisted',
  });
}
