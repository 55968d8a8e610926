import { parseJobPage } from '../adapters/index.js';
import type { AppConfig } from '../config.js';
import { classifySite } from '../detection/classify.js';
import { detectLoginWall } from '../detection/loginWall.js';
import { InvalidUrlError } from '../errors.js';
import { displayValue, emptyResult, hasMinimumData, mergeResults } from '../extraction/result.js';
import type { ModelClient } from '../model/client.js';
import { extractWithModel } from '../model/extract.js';
import { fetchPage } from '../net/fetchPage.js';
import type { QuotaNotifier } from '../notify/quotaAlert.js';
import type {
  AdSource,
  AnalysisRequest,
  AnalysisResponse,
  ExtractionErrorCode,
  ExtractionResult,
  ExtractionStrategy,
  FetchFailure,
} from '../types.js';
import type { HttpClient } from '../utils/http.js';
import type { Logger } from '../utils/logger.js';
import { hasAcceptedScheme } from '../utils/url.js';

export const INSUFFICIENT_DATA_MESSAGE =
  'Unable to extract job data from the page. The page may not contain a valid job posting, or the structure may have changed.';

export const LOGIN_WALL_MESSAGE =
  'LinkedIn requires sign-in to show this job posting. Paste the job description manually, or supply the page HTML saved from a signed-in browser session.';

export const CAPTCHA_MESSAGE =
  'The job site answered with a verification challenge (CAPTCHA). Open the posting in a browser, complete the check, and paste the job description or the page HTML.';

export const CANCELLED_MESSAGE = 'Analysis cancelled before it completed.';

const FETCH_ERROR_CODES: Record<FetchFailure, ExtractionErrorCode> = {
  timeout: 'FetchTimeout',
  network: 'FetchNetworkError',
  http: 'FetchHttpError',
  cancelled: 'Cancelled',
};

const MODEL_ERROR_CODES: Partial<Record<string, ExtractionErrorCode>> = {
  'model-assisted-quota-exceeded': 'ModelQuotaExceeded',
  'model-assisted-unavailable': 'ModelUnavailable',
  'model-assisted-timeout': 'ModelTimeout',
  'model-assisted-cancelled': 'Cancelled',
};

export interface AnalyzerDeps {
  httpClient: HttpClient;
  modelClient?: ModelClient;
  notifier?: QuotaNotifier;
  logger: Logger;
  config: Pick<AppConfig, 'fetchTimeoutMs' | 'maxHtmlChars' | 'model' | 'strategy'>;
}

export interface AnalyzeOptions {
  signal?: AbortSignal;
  strategy?: ExtractionStrategy;
}

interface FailureDetails {
  url: string;
  site: AdSource;
  method: string;
  message: string;
  errorCode: ExtractionErrorCode;
}

function failureResponse({ url, site, method, message, errorCode }: FailureDetails): AnalysisResponse {
  return {
    success: false,
    url,
    company: displayValue(undefined),
    job_title: displayValue(undefined),
    full_description: displayValue(undefined),
    hiring_manager: '',
    ad_source: site,
    extractionMethod: method,
    message,
    errorCode,
  };
}

function assembleResponse(
  url: string,
  site: AdSource,
  result: ExtractionResult,
  modelMethod?: string,
): AnalysisResponse {
  const response: AnalysisResponse = {
    success: hasMinimumData(result),
    url,
    company: displayValue(result.company),
    job_title: displayValue(result.jobTitle),
    full_description: displayValue(result.jobDescription),
    hiring_manager: result.hiringManager,
    ad_source: site,
    extractionMethod: result.method,
  };
  if (!response.success) {
    response.message = INSUFFICIENT_DATA_MESSAGE;
    response.errorCode = (modelMethod && MODEL_ERROR_CODES[modelMethod]) || 'InsufficientData';
  }
  return response;
}

export class JobUrlAnalyzer {
  constructor(private readonly deps: AnalyzerDeps) {}

  /**
   * Runs one analysis. Throws only `InvalidUrlError`; every other failure is a
   * `success: false` response.
   */
  async analyze(request: AnalysisRequest, options: AnalyzeOptions = {}): Promise<AnalysisResponse> {
    const { url } = request;
    if (!hasAcceptedScheme(url)) {
      throw new InvalidUrlError(url);
    }

    const { logger, config } = this.deps;
    const { signal } = options;
    const strategy = options.strategy ?? config.strategy;
    const site = classifySite(url);
    const supplied = request.htmlContent?.trim() ? request.htmlContent : undefined;

    await logger.info(
      `Analyzing ${url} (site=${site}, strategy=${strategy}, user_id=${request.userId ?? '-'}, user_email=${
        request.userEmail ?? '-'
      }, html_provided=${supplied !== undefined})`,
    );

    let html: string;
    let captchaDetected = false;
    if (supplied !== undefined) {
      html = supplied;
    } else {
      const outcome = await fetchPage(url, this.deps.httpClient, {
        site,
        timeoutMs: config.fetchTimeoutMs,
        signal,
      });
      if (outcome.html === undefined) {
        const error = outcome.error ?? 'Unknown error';
        await logger.error(`Fetch failed for ${url}: ${error}`);
        return failureResponse({
          url,
          site,
          method: 'error',
          message: `Failed to fetch page content: ${error}`,
          errorCode: FETCH_ERROR_CODES[outcome.failure ?? 'network'],
        });
      }
      html = outcome.html;
      captchaDetected = outcome.captchaDetected ?? false;

      if (site === 'linkedin') {
        const wall = detectLoginWall(html, site);
        if (wall.detected) {
          await logger.warn(`LinkedIn login wall for ${url} (${wall.reason}${wall.signal ? `: ${wall.signal}` : ''})`);
          return failureResponse({
            url,
            site,
            method: 'linkedin-login-wall',
            message: LOGIN_WALL_MESSAGE,
            errorCode: 'LoginWallRequired',
          });
        }
      }
    }

    let parsed: ExtractionResult | undefined;
    if (strategy === 'cascade') {
      parsed = parseJobPage(html, url, site);
      await logger.info(`Site parser: method=${parsed.method}, complete=${parsed.isComplete}`);
      if (parsed.method === 'structured-jsonld' && parsed.isComplete) {
        return assembleResponse(url, site, parsed);
      }
    }

    if (captchaDetected && !parsed?.isComplete) {
      await logger.warn(`CAPTCHA detected for ${url}`);
      return failureResponse({
        url,
        site,
        method: 'captcha-required',
        message: CAPTCHA_MESSAGE,
        errorCode: 'CaptchaRequired',
      });
    }

    if (signal?.aborted) {
      return failureResponse({ url, site, method: 'error', message: CANCELLED_MESSAGE, errorCode: 'Cancelled' });
    }

    const modelResult = await extractWithModel(
      html,
      {
        client: this.deps.modelClient,
        notifier: this.deps.notifier,
        logger,
        model: config.model,
        maxHtmlChars: config.maxHtmlChars,
      },
      { url, site, signal },
    );

    const result = mergeResults(parsed, modelResult) ?? emptyResult(site, 'error');
    const response = assembleResponse(url, site, result, modelResult.method);
    await logger.info(
      `Result for ${url}: success=${response.success}, method=${response.extractionMethod}, company=${response.company}, description_chars=${result.jobDescription?.length ?? 0}`,
    );
    return response;
  }
}
