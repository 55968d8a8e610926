import type { ExtractionStrategy } from './types.js';

export interface SmtpSettings {
  host?: string;
  port?: string;
  user?: string;
  pass?: string;
  from?: string;
  to?: string;
}

export interface AppConfig {
  openAiApiKey?: string;
  model: string;
  maxCompletionTokens: number;
  modelTimeoutMs: number;
  fetchTimeoutMs: number;
  maxHtmlChars: number;
  strategy: ExtractionStrategy;
  logDir: string;
  smtp: SmtpSettings;
}

type Env = Record<string, string | undefined>;

function positiveInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.floor(parsed);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseStrategy(value: string | undefined): ExtractionStrategy {
  return value?.trim().toLowerCase() === 'model-only' ? 'model-only' : 'cascade';
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    openAiApiKey: nonEmpty(env.OPENAI_API_KEY),
    model: nonEmpty(env.OPENAI_MODEL) ?? 'gpt-4.1-mini',
    maxCompletionTokens: positiveInt(env.OPENAI_MAX_COMPLETION_TOKENS, 16000),
    modelTimeoutMs: positiveInt(env.MODEL_TIMEOUT_MS, 90000),
    fetchTimeoutMs: positiveInt(env.FETCH_TIMEOUT_MS, 10000),
    maxHtmlChars: positiveInt(env.MAX_HTML_CHARS, 150000),
    strategy: parseStrategy(env.EXTRACTION_STRATEGY),
    logDir: nonEmpty(env.LOG_DIR) ?? 'logs',
    smtp: {
      host: nonEmpty(env.SMTP_HOST),
      port: nonEmpty(env.SMTP_PORT),
      user: nonEmpty(env.SMTP_USER),
      pass: nonEmpty(env.SMTP_PASS),
      from: nonEmpty(env.EMAIL_FROM),
      to: nonEmpty(env.ALERT_EMAIL_TO),
    },
  };
}
