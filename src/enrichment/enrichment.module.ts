import { DynamicModule, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvironmentVariables } from '../config/env.validation';
import { GeminiApiService } from '../gemini/gemini-api.service';
import { GeminiModule } from '../gemini/gemini.module';
import { GeminiOverrides } from '../gemini/gemini.types';
import { EnrichmentOrchestrator } from './enrichment-orchestrator.service';
import { ENRICHMENT_OPTIONS, EnrichmentOptions } from './enrichment.types';
import { MODEL_SERVICE } from './interfaces/model-service.interface';

export interface EnrichmentModuleOptions {
  /** 지정하지 않으면 ENRICH_DELAY_MS 사용 */
  interCallDelayMs?: number;
  gemini?: GeminiOverrides;
}

/**
 * 게임 속성 보강 모듈
 *
 * 제공 기능:
 * - EnrichmentOrchestrator: 순차/고정 간격 보강 루프
 * - MODEL_SERVICE: Gemini 구현 바인딩
 */
@Module({})
export class EnrichmentModule {
  static register(options: EnrichmentModuleOptions = {}): DynamicModule {
    return {
      module: EnrichmentModule,
      imports: [GeminiModule.register(options.gemini)],
      providers: [
        { provide: MODEL_SERVICE, useExisting: GeminiApiService },
        {
          provide: ENRICHMENT_OPTIONS,
          inject: [ConfigService],
          useFactory: (
            config: ConfigService<EnvironmentVariables, true>,
          ): EnrichmentOptions => ({
            interCallDelayMs:
              options.interCallDelayMs ??
              config.get('ENRICH_DELAY_MS', { infer: true }),
          }),
        },
        EnrichmentOrchestrator,
      ],
      exports: [EnrichmentOrchestrator, MODEL_SERVICE],
    };
  }
}
