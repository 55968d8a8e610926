import type OpenAI from 'openai';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { InvalidUrlError } from '../src/errors.js';
import type { CompleteOptions, ModelClient } from '../src/model/client.js';
import {
  CAPTCHA_MESSAGE,
  INSUFFICIENT_DATA_MESSAGE,
  JobUrlAnalyzer,
  LOGIN_WALL_MESSAGE,
} from '../src/pipeline/analyzer.js';
import type { AnalyzerDeps } from '../src/pipeline/analyzer.js';
import type { ModelCallOutcome } from '../src/types.js';
import { HttpClient } from '../src/utils/http.js';
import { createTestLogger } from './fixtures/logger.js';
import {
  CAPTCHA_PAGE,
  INDEED_DESCRIPTION,
  INDEED_PAGE,
  JSONLD_DESCRIPTION_TEXT,
  JSONLD_PAGE,
  LINKEDIN_LOGIN_PAGE,
} from './fixtures/pages.js';

interface FetchInit {
  signal?: AbortSignal;
}

const INDEED_URL = 'https://www.indeed.com/viewjob?jk=1';
const GENERIC_URL = 'https://careers.example.com/jobs/1';
const MODEL_DESCRIPTION =
  'Initech warehouse associates receive inbound freight, stage orders for shipping, run cycle counts and keep the floor safe. Full benefits from day one, including overtime pay on weekends.';

function fakeModel(outcome: ModelCallOutcome) {
  return {
    complete: vi.fn(
      async (_messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[], _options?: CompleteOptions) => outcome,
    ),
  } satisfies ModelClient;
}

function serve(body: string, status = 200): void {
  vi.stubGlobal(
    'fetch',
    vi.fn(async (_url: string, _init?: FetchInit) => new Response(body, { status })),
  );
}

function createAnalyzer(overrides: Partial<AnalyzerDeps> = {}): JobUrlAnalyzer {
  return new JobUrlAnalyzer({
    httpClient: new HttpClient(1000),
    logger: createTestLogger(),
    config: { fetchTimeoutMs: 1000, maxHtmlChars: 150000, model: 'gpt-test', strategy: 'cascade' },
    ...overrides,
  });
}

describe('JobUrlAnalyzer', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('rejects URLs without an http(s) scheme before any I/O', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    await expect(createAnalyzer().analyze({ url: 'ftp://example.com/job' })).rejects.toBeInstanceOf(InvalidUrlError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('returns JSON-LD data without calling the model', async () => {
    serve(JSONLD_PAGE);
    const model = fakeModel({ kind: 'failed', message: 'should not be called' });

    const response = await createAnalyzer({ modelClient: model }).analyze({ url: GENERIC_URL });

    expect(response).toEqual({
      success: true,
      url: GENERIC_URL,
      company: 'Acme',
      job_title: 'Backend Engineer',
      full_description: JSONLD_DESCRIPTION_TEXT,
      hiring_manager: '',
      ad_source: 'generic',
      extractionMethod: 'structured-jsonld',
    });
    expect(model.complete).not.toHaveBeenCalled();
  });

  it('uses caller-supplied markup instead of fetching', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    const response = await createAnalyzer().analyze({ url: GENERIC_URL, htmlContent: JSONLD_PAGE });

    expect(response.company).toBe('Acme');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('stops at a LinkedIn login wall', async () => {
    serve(LINKEDIN_LOGIN_PAGE);
    const url = 'https://www.linkedin.com/jobs/view/123';

    const response = await createAnalyzer().analyze({ url });

    expect(response).toEqual({
      success: false,
      url,
      company: 'Not specified',
      job_title: 'Not specified',
      full_description: 'Not specified',
      hiring_manager: '',
      ad_source: 'linkedin',
      extractionMethod: 'linkedin-login-wall',
      message: LOGIN_WALL_MESSAGE,
      errorCode: 'LoginWallRequired',
    });
    expect(response.message).toContain('Paste the job description manually');
  });

  it('skips the login-wall check for caller-supplied LinkedIn markup', async () => {
    const response = await createAnalyzer().analyze({
      url: 'https://www.linkedin.com/jobs/view/123',
      htmlContent: LINKEDIN_LOGIN_PAGE,
    });

    expect(response.extractionMethod).toBe('model-assisted-unavailable');
    expect(response.errorCode).toBe('ModelUnavailable');
  });

  it('reports a fetch timeout as an error payload', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: string, init?: FetchInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
          }),
      ),
    );
    const analyzer = createAnalyzer({
      config: { fetchTimeoutMs: 20, maxHtmlChars: 150000, model: 'gpt-test', strategy: 'cascade' },
    });

    const response = await analyzer.analyze({ url: GENERIC_URL });

    expect(response).toEqual({
      success: false,
      url: GENERIC_URL,
      company: 'Not specified',
      job_title: 'Not specified',
      full_description: 'Not specified',
      hiring_manager: '',
      ad_source: 'generic',
      extractionMethod: 'error',
      message: 'Failed to fetch page content: Request timeout',
      errorCode: 'FetchTimeout',
    });
  });

  it('reports a cancelled analysis', async () => {
    serve(JSONLD_PAGE);
    const controller = new AbortController();
    controller.abort();

    const response = await createAnalyzer().analyze({ url: GENERIC_URL }, { signal: controller.signal });

    expect(response.errorCode).toBe('Cancelled');
    expect(response.message).toBe('Failed to fetch page content: Request cancelled');
  });

  it('asks for human verification when a CAPTCHA blocks an incomplete page', async () => {
    serve(CAPTCHA_PAGE);
    const model = fakeModel({ kind: 'failed', message: 'should not be called' });

    const response = await createAnalyzer({ modelClient: model }).analyze({ url: GENERIC_URL });

    expect(response.extractionMethod).toBe('captcha-required');
    expect(response.errorCode).toBe('CaptchaRequired');
    expect(response.message).toBe(CAPTCHA_MESSAGE);
    expect(model.complete).not.toHaveBeenCalled();
  });

  it('merges model fields over heuristic ones', async () => {
    serve(INDEED_PAGE);
    const model = fakeModel({
      kind: 'ok',
      text: JSON.stringify({
        company: 'Initech',
        job_title: 'Warehouse Associate',
        full_description: MODEL_DESCRIPTION,
        hiring_manager: 'Dana Scully',
        ad_source: 'generic',
      }),
    });

    const response = await createAnalyzer({ modelClient: model }).analyze({ url: INDEED_URL });

    expect(response).toEqual({
      success: true,
      url: INDEED_URL,
      company: 'Initech',
      job_title: 'Warehouse Associate',
      full_description: MODEL_DESCRIPTION,
      hiring_manager: 'Dana Scully',
      ad_source: 'indeed',
      extractionMethod: 'model-assisted',
    });
  });

  it('keeps heuristic data when the model is not configured', async () => {
    serve(INDEED_PAGE);

    const response = await createAnalyzer().analyze({ url: INDEED_URL });

    expect(response.success).toBe(true);
    expect(response.extractionMethod).toBe('heuristic-indeed');
    expect(response.full_description).toBe(INDEED_DESCRIPTION);
    expect(response.errorCode).toBeUndefined();
  });

  it('reports a quota failure when nothing usable was found', async () => {
    serve('<html><body><p>Nothing to see</p></body></html>');
    const model = fakeModel({ kind: 'quota_exceeded', message: 'insufficient_quota' });

    const response = await createAnalyzer({ modelClient: model }).analyze({ url: GENERIC_URL });

    expect(response.success).toBe(false);
    expect(response.extractionMethod).toBe('model-assisted-quota-exceeded');
    expect(response.errorCode).toBe('ModelQuotaExceeded');
    expect(response.message).toBe(INSUFFICIENT_DATA_MESSAGE);
  });

  it('always calls the model under the model-only strategy', async () => {
    const model = fakeModel({
      kind: 'ok',
      text: '{"company":"Acme","job_title":"Backend Engineer","full_description":"Build APIs.","hiring_manager":"","ad_source":"generic"}',
    });

    const response = await createAnalyzer({ modelClient: model }).analyze(
      { url: GENERIC_URL, htmlContent: JSONLD_PAGE },
      { strategy: 'model-only' },
    );

    expect(model.complete).toHaveBeenCalledTimes(1);
    expect(response.extractionMethod).toBe('model-assisted');
    expect(response.full_description).toBe('Build APIs.');
  });
});
