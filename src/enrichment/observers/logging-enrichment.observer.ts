import { Logger } from '@nestjs/common';
import { LoggerHelper } from '../../common/utils/logger.helper';
import { ATTRIBUTE_LABELS, AttributeKind } from '../attribute-kind';
import { EnrichmentSummary } from '../enrichment.types';
import { EnrichmentObserver } from '../interfaces/enrichment-observer.interface';
import { QueryFailure } from '../interfaces/model-service.interface';

const DESCRIPTION_PREVIEW_LENGTH = 50;

/**
 * Nest Logger로 행/속성 단위 진행 상황을 출력
 */
export class LoggingEnrichmentObserver implements EnrichmentObserver {
  constructor(
    private readonly logger: Logger = new Logger('EnrichmentProgress'),
  ) {}

  onStart(totalRows: number): void {
    LoggerHelper.logStart(this.logger, '🎮 게임 속성 보강', {
      games: totalRows,
    });
    this.logger.log('-'.repeat(50));
  }

  onRowStart(index: number, totalRows: number, gameTitle: string): void {
    this.logger.log(`Processing [${index + 1}/${totalRows}]: ${gameTitle}`);
  }

  onAttributeResolved(index: number, kind: AttributeKind, value: string): void {
    const shown =
      kind === AttributeKind.Description
        ? `${value.slice(0, DESCRIPTION_PREVIEW_LENGTH)}...`
        : value;
    this.logger.log(`  ${ATTRIBUTE_LABELS[kind]}: ${shown}`);
  }

  onQueryFailure(index: number, failure: QueryFailure): void {
    const label = failure.kind ? ATTRIBUTE_LABELS[failure.kind] : '모델 호출';
    LoggerHelper.logWarning(
      this.logger,
      `${label} 질의`,
      `${failure.reason} - ${failure.message} → 대체값 사용`,
      { row: index, title: failure.gameTitle },
    );
  }

  onComplete(summary: EnrichmentSummary): void {
    LoggerHelper.logStats(
      this.logger,
      '🎮 게임 속성 보강',
      {
        rows: summary.totalRows,
        queries: summary.totalQueries,
        failed: summary.failedQueries,
        fallbacks: summary.fallbackCounts,
      },
      summary.elapsedMs,
    );
  }
}
