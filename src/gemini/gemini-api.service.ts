// src/gemini/gemini-api.service.ts
import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { ConfigurationError } from '../common/errors/enricher.errors';
import { err, ok, Result } from '../common/types/result';
import {
  ErrorHandlerUtil,
  toErrorMessage,
} from '../common/utils/error-handler.util';
import { maskSecret } from '../common/utils/mask.util';
import { EnvironmentVariables } from '../config/env.validation';
import {
  ModelService,
  QueryFailure,
} from '../enrichment/interfaces/model-service.interface';
import {
  GEMINI_GENERATION_CONFIG,
  GEMINI_USER_AGENT,
} from './config/gemini.config';
import {
  GEMINI_OVERRIDES,
  GeminiGenerateContentRequest,
  GeminiGenerateContentResponse,
  GeminiOverrides,
} from './gemini.types';

/**
 * Gemini generateContent 호출 서비스
 *
 * - 호출당 1회 시도 (재시도/캐시 없음)
 * - 실패는 예외 대신 err(QueryFailure)로 반환
 * - API 키는 x-goog-api-key 헤더로 전달 (URL/로그에 노출하지 않음)
 */
@Injectable()
export class GeminiApiService implements ModelService {
  private readonly logger = new Logger(GeminiApiService.name);
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly httpService: HttpService,
    config: ConfigService<EnvironmentVariables, true>,
    @Optional()
    @Inject(GEMINI_OVERRIDES)
    overrides?: GeminiOverrides,
  ) {
    const apiKey =
      overrides?.apiKey?.trim() ||
      config.get('GOOGLE_API_KEY', { infer: true })?.trim();
    if (!apiKey) {
      throw new ConfigurationError(
        'API 키가 없습니다. --api-key 옵션 또는 GOOGLE_API_KEY 환경 변수를 설정하세요. ' +
          '(발급: https://aistudio.google.com/app/apikey)',
      );
    }
    this.apiKey = apiKey;
    this.model =
      overrides?.model?.trim() || config.get('GEMINI_MODEL', { infer: true });
    this.baseUrl = config
      .get('GEMINI_API_BASE_URL', { infer: true })
      .replace(/\/+$/, '');
    this.timeoutMs = config.get('GEMINI_TIMEOUT_MS', { infer: true });

    this.logger.log(
      `🔧 Gemini 설정: model=${this.model}, key=${maskSecret(this.apiKey)}, timeout=${this.timeoutMs}ms`,
    );
  }

  get modelName(): string {
    return this.model;
  }

  async generate(prompt: string): Promise<Result<string, QueryFailure>> {
    const endpoint = `/models/${encodeURIComponent(this.model)}:generateContent`;
    const body: GeminiGenerateContentRequest = {
      contents: [{ role: 'user', parts: [{ text: prompt }] }],
      generationConfig: { ...GEMINI_GENERATION_CONFIG },
    };

    const response = await ErrorHandlerUtil.captureAsResult(
      async () => {
        const res = await firstValueFrom(
          this.httpService.post<GeminiGenerateContentResponse>(
            `${this.baseUrl}${endpoint}`,
            body,
            {
              timeout: this.timeoutMs,
              headers: {
                'Content-Type': 'application/json',
                'User-Agent': GEMINI_USER_AGENT,
                'x-goog-api-key': this.apiKey,
              },
            },
          ),
        );
        return res.data;
      },
      (error): QueryFailure => ({
        reason: 'request-failed',
        message: toErrorMessage(error),
        cause: error,
      }),
    );

    if (!response.ok) {
      this.logger.warn(
        `⚠️ Gemini API 실패 ${endpoint}: ${response.error.message}`,
      );
      return response;
    }

    return this.extractText(response.value);
  }

  private extractText(
    data: GeminiGenerateContentResponse,
  ): Result<string, QueryFailure> {
    const blockReason = data.promptFeedback?.blockReason;
    if (blockReason) {
      this.logger.warn(`🚫 Gemini 응답 차단: ${blockReason}`);
      return err({ reason: 'blocked', message: `차단됨 (${blockReason})` });
    }

    const parts = data.candidates?.[0]?.content?.parts ?? [];
    const text = parts
      .map((part) => part.text ?? '')
      .join('')
      .trim();

    if (!text) {
      const finishReason = data.candidates?.[0]?.finishReason ?? 'N/A';
      return err({
        reason: 'empty-response',
        message: `빈 응답 (finishReason: ${finishReason})`,
      });
    }
    return ok(text);
  }
}
