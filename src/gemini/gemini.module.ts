import { DynamicModule, Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { GeminiApiService } from './gemini-api.service';
import { GEMINI_OVERRIDES, GeminiOverrides } from './gemini.types';

/**
 * Gemini 생성형 모델 연동 모듈
 *
 * 제공 기능:
 * - GeminiApiService: generateContent 단건 호출 (ModelService 구현)
 */
@Module({})
export class GeminiModule {
  static register(overrides: GeminiOverrides = {}): DynamicModule {
    return {
      module: GeminiModule,
      imports: [HttpModule],
      providers: [
        { provide: GEMINI_OVERRIDES, useValue: overrides },
        GeminiApiService,
      ],
      exports: [GeminiApiService],
    };
  }
}
