import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { setTimeout as sleep } from 'timers/promises';
import { ConfigurationError } from '../common/errors/enricher.errors';
import { err, Result } from '../common/types/result';
import {
  ErrorHandlerUtil,
  toErrorMessage,
} from '../common/utils/error-handler.util';
import { ENRICHMENT_DEFAULTS } from '../config/enrichment.config';
import {
  appendEnrichedColumns,
  Dataset,
  EnrichedDataset,
  EnrichedRow,
  Row,
} from '../dataset/dataset.types';
import {
  ATTRIBUTE_COLUMNS,
  ATTRIBUTE_ORDER,
  AttributeKind,
} from './attribute-kind';
import {
  ENRICHMENT_OPTIONS,
  EnrichmentOptions,
  EnrichmentOutcome,
  EnrichmentSummary,
  Sleeper,
} from './enrichment.types';
import { EnrichmentObserver } from './interfaces/enrichment-observer.interface';
import {
  MODEL_SERVICE,
  ModelService,
  QueryFailure,
} from './interfaces/model-service.interface';
import { buildAttributePrompt } from './prompts/game-attribute.prompts';
import { resolveAttribute } from './utils/response-normalizer.util';

const defaultSleep: Sleeper = async (ms) => {
  await sleep(ms);
};

/**
 * 게임 속성 보강 오케스트레이터
 *
 * 처리 순서:
 * 1. 행을 인덱스 순으로 순회
 * 2. 행마다 Genre → Description → PlayerMode 순으로 모델 호출
 * 3. 호출 직후 성공/실패와 무관하게 interCallDelayMs 대기 (행당 3회)
 * 4. 실패한 질의는 해당 필드만 대체값으로 채우고 계속 진행
 *
 * 동시 실행 없음. i번째 행의 질의가 모두 끝나야 i+1번째 행을 시작한다.
 */
@Injectable()
export class EnrichmentOrchestrator {
  private readonly logger = new Logger(EnrichmentOrchestrator.name);
  private readonly interCallDelayMs: number;
  private readonly sleep: Sleeper;

  constructor(
    @Inject(MODEL_SERVICE) private readonly modelService: ModelService,
    @Optional()
    @Inject(ENRICHMENT_OPTIONS)
    options?: EnrichmentOptions,
  ) {
    const delay = options?.interCallDelayMs ?? ENRICHMENT_DEFAULTS.interCallDelayMs;
    if (!Number.isFinite(delay) || delay < 0) {
      throw new ConfigurationError(
        `interCallDelayMs는 0 이상의 유한한 숫자여야 합니다 (입력값: ${delay})`,
      );
    }
    this.interCallDelayMs = delay;
    this.sleep = options?.sleep ?? defaultSleep;
  }

  async enrich(
    dataset: Dataset,
    observer: EnrichmentObserver = {},
  ): Promise<EnrichmentOutcome> {
    const startedAt = Date.now();
    const totalRows = dataset.rows.length;
    const summary: EnrichmentSummary = {
      totalRows,
      totalQueries: 0,
      failedQueries: 0,
      fallbackCounts: {
        [AttributeKind.Genre]: 0,
        [AttributeKind.Description]: 0,
        [AttributeKind.PlayerMode]: 0,
      },
      elapsedMs: 0,
    };

    observer.onStart?.(totalRows);

    const rows: EnrichedRow[] = [];
    for (let index = 0; index < totalRows; index++) {
      const row = dataset.rows[index];
      observer.onRowStart?.(index, totalRows, row.game_title);
      rows.push(await this.enrichRow(index, row, summary, observer));
    }

    summary.elapsedMs = Date.now() - startedAt;
    observer.onComplete?.(summary);

    const enriched: EnrichedDataset = {
      columns: appendEnrichedColumns(dataset.columns),
      rows,
    };
    return { dataset: enriched, summary };
  }

  private async enrichRow(
    index: number,
    row: Row,
    summary: EnrichmentSummary,
    observer: EnrichmentObserver,
  ): Promise<EnrichedRow> {
    const gameTitle = row.game_title;
    const enriched: EnrichedRow = {
      ...row,
      genre: '',
      short_description: '',
      player_mode: '',
    };

    for (const kind of ATTRIBUTE_ORDER) {
      const result = await this.query(kind, gameTitle);
      summary.totalQueries++;

      if (!result.ok) {
        summary.failedQueries++;
        summary.fallbackCounts[kind]++;
        observer.onQueryFailure?.(index, result.error);
      }

      const value = resolveAttribute(kind, result);
      enriched[ATTRIBUTE_COLUMNS[kind]] = value;
      observer.onAttributeResolved?.(index, kind, value);

      // 마지막 행의 마지막 호출 뒤에도 대기한다 (고정 3회/행 간격 유지)
      await this.sleep(this.interCallDelayMs);
    }

    return enriched;
  }

  /**
   * 모델 서비스가 Result 대신 예외를 던져도 동일하게 실패로 취급
   */
  private async query(
    kind: AttributeKind,
    gameTitle: string,
  ): Promise<Result<string, QueryFailure>> {
    const prompt = buildAttributePrompt(kind, gameTitle);
    const captured = await ErrorHandlerUtil.captureAsResult(
      () => this.modelService.generate(prompt),
      (error): QueryFailure => ({
        reason: 'request-failed',
        message: toErrorMessage(error),
        cause: error,
      }),
    );
    const result = captured.ok ? captured.value : captured;
    if (result.ok) return result;

    this.logger.debug(`질의 실패 (${kind}): ${gameTitle}`);
    return err({ ...result.error, kind, gameTitle });
  }
}

/**
 * Nest 컨테이너 밖에서 쓰기 위한 팩토리
 */
export function createEnrichmentOrchestrator(
  modelService: ModelService,
  options?: EnrichmentOptions,
): EnrichmentOrchestrator {
  return new EnrichmentOrchestrator(modelService, options);
}
