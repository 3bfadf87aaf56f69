import { plainToInstance, Type } from 'class-transformer';
import {
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Min,
  MinLength,
  validateSync,
} from 'class-validator';
import { ConfigurationError } from '../common/errors/enricher.errors';
import {
  ENRICHMENT_DEFAULTS,
  GEMINI_API_BASE_URL,
  GEMINI_DEFAULTS,
} from './enrichment.config';

/**
 * 환경 변수 스키마
 * GOOGLE_API_KEY는 여기서 필수로 두지 않는다 (--api-key로 대체 가능).
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsString()
  @MinLength(1, { message: 'GOOGLE_API_KEY는 빈 문자열일 수 없습니다' })
  GOOGLE_API_KEY?: string;

  @IsString()
  GEMINI_MODEL: string = GEMINI_DEFAULTS.model;

  @IsUrl(
    { require_tld: false },
    { message: 'GEMINI_API_BASE_URL은 올바른 URL이어야 합니다' },
  )
  GEMINI_API_BASE_URL: string = GEMINI_API_BASE_URL;

  @Type(() => Number)
  @IsInt({ message: 'GEMINI_TIMEOUT_MS는 정수여야 합니다' })
  @Min(1, { message: 'GEMINI_TIMEOUT_MS는 1 이상이어야 합니다' })
  GEMINI_TIMEOUT_MS: number = GEMINI_DEFAULTS.timeoutMs;

  @Type(() => Number)
  @IsInt({ message: 'ENRICH_DELAY_MS는 정수여야 합니다' })
  @Min(0, { message: 'ENRICH_DELAY_MS는 0 이상이어야 합니다' })
  ENRICH_DELAY_MS: number = ENRICHMENT_DEFAULTS.interCallDelayMs;
}

/** ConfigModule.forRoot({ validate }) 용 검증 함수 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    exposeDefaultValues: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    const messages = errors.flatMap((e) => Object.values(e.constraints ?? {}));
    throw new ConfigurationError(`환경 변수 검증 실패: ${messages.join('; ')}`);
  }
  return validated;
}
