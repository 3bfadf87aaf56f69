import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { of, throwError } from 'rxjs';
import { ConfigurationError } from '../../../src/common/errors/enricher.errors';
import { EnvironmentVariables } from '../../../src/config/env.validation';
import { GeminiApiService } from '../../../src/gemini/gemini-api.service';
import {
  GeminiGenerateContentResponse,
  GeminiOverrides,
} from '../../../src/gemini/gemini.types';

const ENV_KEYS = [
  'GOOGLE_API_KEY',
  'GEMINI_MODEL',
  'GEMINI_API_BASE_URL',
  'GEMINI_TIMEOUT_MS',
];

describe('GeminiApiService', () => {
  const savedEnv: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      if (savedEnv[key] === undefined) delete process.env[key];
      else process.env[key] = savedEnv[key];
    }
  });

  const toResponse = (
    data: GeminiGenerateContentResponse,
  ): AxiosResponse<GeminiGenerateContentResponse> => ({
    data,
    status: 200,
    statusText: 'OK',
    headers: {},
    config: { headers: new AxiosHeaders() },
  });

  const createService = (
    options: {
      apiKey?: string;
      overrides?: GeminiOverrides;
    } = {},
  ) => {
    const httpService: Partial<HttpService> = {
      post: jest.fn(),
    };
    const config = new ConfigService<EnvironmentVariables, true>({
      GOOGLE_API_KEY: 'apiKey' in options ? options.apiKey : 'test-secret',
      GEMINI_MODEL: 'gemini-1.5-flash',
      GEMINI_API_BASE_URL: 'https://gemini.example.test/v1beta/',
      GEMINI_TIMEOUT_MS: 1000,
      ENRICH_DELAY_MS: 0,
    });
    const service = new GeminiApiService(
      httpService as HttpService,
      config,
      options.overrides,
    );
    return { service, httpService };
  };

  it('generateContent를 호출하고 모든 part의 텍스트를 합쳐 반환', async () => {
    const { service, httpService } = createService();
    (httpService.post as jest.Mock).mockReturnValue(
      of(
        toResponse({
          candidates: [
            {
              content: { role: 'model', parts: [{ text: ' Strategy' }, { text: ' game.\n' }] },
              finishReason: 'STOP',
            },
          ],
        }),
      ),
    );

    const result = await service.generate('Classify ...');

    expect(result).toEqual({ ok: true, value: 'Strategy game.' });
    expect(httpService.post).toHaveBeenCalledWith(
      'https://gemini.example.test/v1beta/models/gemini-1.5-flash:generateContent',
      {
        contents: [{ role: 'user', parts: [{ text: 'Classify ...' }] }],
        generationConfig: { temperature: 0.2, maxOutputTokens: 128 },
      },
      expect.objectContaining({
        timeout: 1000,
        headers: expect.objectContaining({ 'x-goog-api-key': 'test-secret' }),
      }),
    );
  });

  it('CLI 오버라이드가 환경 변수보다 우선', async () => {
    const { service, httpService } = createService({
      overrides: { apiKey: 'override-key', model: 'gemini-1.5-pro' },
    });
    (httpService.post as jest.Mock).mockReturnValue(
      of(toResponse({ candidates: [{ content: { parts: [{ text: 'Both' }] } }] })),
    );

    await service.generate('Determine ...');

    expect(service.modelName).toBe('gemini-1.5-pro');
    const [url, , requestConfig] = (httpService.post as jest.Mock).mock.calls[0];
    expect(url).toBe(
      'https://gemini.example.test/v1beta/models/gemini-1.5-pro:generateContent',
    );
    expect(requestConfig.headers['x-goog-api-key']).toBe('override-key');
  });

  it('API 키가 없으면 생성 시점에 ConfigurationError', () => {
    expect(() => createService({ apiKey: undefined })).toThrow(
      ConfigurationError,
    );
  });

  it('HTTP 오류는 request-failed 실패로 반환 (예외 없음)', async () => {
    const { service, httpService } = createService();
    const response: AxiosResponse = {
      data: { error: { message: 'Resource has been exhausted' } },
      status: 429,
      statusText: 'Too Many Requests',
      headers: {},
      config: { headers: new AxiosHeaders() },
    };
    (httpService.post as jest.Mock).mockReturnValue(
      throwError(
        () =>
          new AxiosError(
            'Request failed with status code 429',
            'ERR_BAD_REQUEST',
            undefined,
            undefined,
            response,
          ),
      ),
    );

    const result = await service.generate('Classify ...');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.reason).toBe('request-failed');
      expect(result.error.message).toBe('HTTP 429: Resource has been exhausted');
    }
  });

  it('빈 텍스트는 empty-response 실패', async () => {
    const { service, httpService } = createService();
    (httpService.post as jest.Mock).mockReturnValue(
      of(
        toResponse({
          candidates: [{ content: { parts: [{ text: '  \n' }] }, finishReason: 'MAX_TOKENS' }],
        }),
      ),
    );

    const result = await service.generate('Write ...');

    expect(result).toEqual({
      ok: false,
      error: {
        reason: 'empty-response',
        message: '빈 응답 (finishReason: MAX_TOKENS)',
      },
    });
  });

  it('후보가 없으면 empty-response 실패', async () => {
    const { service, httpService } = createService();
    (httpService.post as jest.Mock).mockReturnValue(of(toResponse({})));

    const result = await service.generate('Write ...');

    expect(result).toEqual({
      ok: false,
      error: { reason: 'empty-response', message: '빈 응답 (finishReason: N/A)' },
    });
  });

  it('차단된 프롬프트는 blocked 실패', async () => {
    const { service, httpService } = createService();
    (httpService.post as jest.Mock).mockReturnValue(
      of(toResponse({ promptFeedback: { blockReason: 'SAFETY' } })),
    );

    const result = await service.generate('Classify ...');

    expect(result).toEqual({
      ok: false,
      error: { reason: 'blocked', message: '차단됨 (SAFETY)' },
    });
  });
});
