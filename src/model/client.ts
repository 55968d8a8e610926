import OpenAI, { APIConnectionTimeoutError, APIUserAbortError } from 'openai';
import type { AppConfig } from '../config.js';
import type { ModelCallOutcome } from '../types.js';

export interface ChatCompletionLike {
  choices: Array<{
    finish_reason: string | null;
    message: { content: string | null };
  }>;
}

export interface CompletionRequestOptions {
  signal?: AbortSignal;
  timeout?: number;
  maxRetries?: number;
}

/** The slice of `openai.chat.completions` the extractor relies on. */
export interface ChatCompletionCreator {
  create(
    body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
    options?: CompletionRequestOptions,
  ): PromiseLike<ChatCompletionLike>;
}

export interface ModelSettings {
  model: string;
  maxCompletionTokens: number;
  timeoutMs: number;
  temperature?: number;
}

export interface CompleteOptions {
  signal?: AbortSignal;
}

export interface ModelClient {
  complete(
    messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[],
    options?: CompleteOptions,
  ): Promise<ModelCallOutcome>;
}

const QUOTA_CODE = 'insufficient_quota';
const QUOTA_PHRASES = ['insufficient_quota', 'exceeded your current quota', 'quota exceeded'];

function field(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isQuotaExceeded(error: unknown): boolean {
  const nested = field(error, 'error');
  const codes = [field(error, 'code'), field(error, 'type'), field(nested, 'code'), field(nested, 'type')];
  if (codes.some((code) => code === QUOTA_CODE)) {
    return true;
  }
  const message = describeError(error).toLowerCase();
  return QUOTA_PHRASES.some((phrase) => message.includes(phrase));
}

export function classifyModelError(error: unknown, signal?: AbortSignal): ModelCallOutcome {
  if (error instanceof APIConnectionTimeoutError || /timed out/i.test(describeError(error))) {
    return { kind: 'timeout', message: describeError(error) };
  }
  if (error instanceof APIUserAbortError || signal?.aborted) {
    return { kind: 'cancelled' };
  }
  if (isQuotaExceeded(error)) {
    return { kind: 'quota_exceeded', message: describeError(error) };
  }
  const status = field(error, 'status');
  if (status === 401 || status === 403) {
    return { kind: 'unavailable', reason: describeError(error) };
  }
  return { kind: 'failed', message: describeError(error) };
}

export class OpenAiModelClient implements ModelClient {
  constructor(
    private readonly completions: ChatCompletionCreator,
    private readonly settings: ModelSettings,
  ) {}

  async complete(
    messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[],
    options: CompleteOptions = {},
  ): Promise<ModelCallOutcome> {
    if (options.signal?.aborted) {
      return { kind: 'cancelled' };
    }

    let response: ChatCompletionLike;
    try {
      // timeoutMs bounds the whole call only while retries stay off.
      response = await this.completions.create(
        {
          model: this.settings.model,
          messages,
          temperature: this.settings.temperature ?? 0.1,
          max_completion_tokens: this.settings.maxCompletionTokens,
          response_format: { type: 'json_object' },
        },
        { signal: options.signal, timeout: this.settings.timeoutMs, maxRetries: 0 },
      );
    } catch (error) {
      return classifyModelError(error, options.signal);
    }

    const choice = response.choices[0];
    const text = choice?.message.content?.trim();
    if (!choice || !text) {
      return { kind: 'failed', message: 'Empty response from model' };
    }
    if (choice.finish_reason === 'length') {
      return { kind: 'truncated', text };
    }
    return { kind: 'ok', text };
  }
}

/** Returns undefined when no API key is configured. */
export function createModelClient(config: AppConfig): ModelClient | undefined {
  if (!config.openAiApiKey) {
    return undefined;
  }
  const openai = new OpenAI({
    apiKey: config.openAiApiKey,
    timeout: config.modelTimeoutMs,
    maxRetries: 0,
  });
  return new OpenAiModelClient(openai.chat.completions, {
    model: config.model,
    maxCompletionTokens: config.maxCompletionTokens,
    timeoutMs: config.modelTimeoutMs,
  });
}
