import { plainToInstance, Type } from 'class-transformer';
import {
  IsInt,
  IsOptional,
  IsString,
  Min,
  MinLength,
  validateSync,
} from 'class-validator';
import { ConfigurationError } from '../common/errors/enricher.errors';
import { ENRICHMENT_DEFAULTS } from '../config/enrichment.config';

/**
 * CLI 옵션 DTO
 *
 * 실행:
 *   - 기본: game-enricher
 *   - 경로 지정: game-enricher --input games.csv --output out/games.csv
 *   - 스모크 테스트: game-enricher --limit 3 --delay-ms 1000
 */
export class EnrichCliOptionsDto {
  @IsString()
  @MinLength(1, { message: 'input은 빈 값일 수 없습니다' })
  input: string = ENRICHMENT_DEFAULTS.inputFile;

  @IsString()
  @MinLength(1, { message: 'output은 빈 값일 수 없습니다' })
  output: string = ENRICHMENT_DEFAULTS.outputFile;

  /** 지정하지 않으면 ENRICH_DELAY_MS */
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'delay-ms는 정수여야 합니다' })
  @Min(0, { message: 'delay-ms는 0 이상이어야 합니다' })
  delayMs?: number;

  @IsOptional()
  @IsString()
  @MinLength(1, { message: 'model은 빈 값일 수 없습니다' })
  model?: string;

  @IsOptional()
  @IsString()
  @MinLength(1, { message: 'api-key는 빈 값일 수 없습니다' })
  apiKey?: string;

  /** 앞에서부터 n개 행만 처리 */
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'limit은 정수여야 합니다' })
  @Min(1, { message: 'limit은 최소 1 이상이어야 합니다' })
  limit?: number;
}

const FLAG_TO_PROPERTY: Record<string, keyof EnrichCliOptionsDto> = {
  '--input': 'input',
  '--output': 'output',
  '--delay-ms': 'delayMs',
  '--model': 'model',
  '--api-key': 'apiKey',
  '--limit': 'limit',
};

/**
 * argv 파서 (--key value, --key=value 둘 다 지원)
 * 알 수 없는 플래그나 값 누락은 ConfigurationError
 */
export function parseCliOptions(argv: readonly string[]): EnrichCliOptionsDto {
  const raw: Record<string, string> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const property = FLAG_TO_PROPERTY[flag];
    if (!property) {
      throw new ConfigurationError(`알 수 없는 옵션: ${arg}`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigurationError(`${flag} 옵션에 값이 필요합니다`);
    }
    raw[property] = value;
  }

  const options = plainToInstance(EnrichCliOptionsDto, raw, {
    exposeDefaultValues: true,
  });
  const errors = validateSync(options);
  if (errors.length > 0) {
    const messages = errors.flatMap((e) => Object.values(e.constraints ?? {}));
    throw new ConfigurationError(`CLI 옵션 검증 실패: ${messages.join('; ')}`);
  }
  return options;
}
