export type AdSource = 'linkedin' | 'indeed' | 'glassdoor' | 'generic';

export const AD_SOURCES: readonly AdSource[] = ['linkedin', 'indeed', 'glassdoor', 'generic'];

export type ExtractionStrategy = 'cascade' | 'model-only';

export interface ExtractionResult {
  readonly company?: string;
  readonly jobTitle?: string;
  readonly jobDescription?: string;
  readonly hiringManager: string;
  readonly adSource: AdSource;
  readonly method: string;
  readonly isComplete: boolean;
}

export type FetchFailure = 'timeout' | 'network' | 'http' | 'cancelled';

export interface FetchOutcome {
  html?: string;
  error?: string;
  captchaDetected?: boolean;
  status?: number;
  failure?: FetchFailure;
}

export interface FetchResult {
  status: number;
  url: string;
  headers: Record<string, string>;
  body: string;
  contentType: string;
}

export type ModelCallOutcome =
  | { kind: 'ok'; text: string }
  | { kind: 'truncated'; text: string }
  | { kind: 'quota_exceeded'; message: string }
  | { kind: 'unavailable'; reason: string }
  | { kind: 'timeout'; message: string }
  | { kind: 'cancelled' }
  | { kind: 'failed'; message: string };

export type ExtractionErrorCode =
  | 'InvalidUrl'
  | 'FetchTimeout'
  | 'FetchNetworkError'
  | 'FetchHttpError'
  | 'CaptchaRequired'
  | 'LoginWallRequired'
  | 'ModelUnavailable'
  | 'ModelQuotaExceeded'
  | 'ModelTimeout'
  | 'ResponseTruncated'
  | 'ResponseUnparseable'
  | 'InsufficientData'
  | 'Cancelled';

export interface AnalysisRequest {
  url: string;
  userId?: string;
  userEmail?: string;
  htmlContent?: string;
}

export interface AnalysisResponse {
  success: boolean;
  url: string;
  company: string;
  job_title: string;
  full_description: string;
  hiring_manager: string;
  ad_source: AdSource;
  extractionMethod: string;
  message?: string;
  errorCode?: ExtractionErrorCode;
}
