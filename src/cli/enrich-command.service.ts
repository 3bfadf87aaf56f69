import { Injectable, Logger } from '@nestjs/common';
import { LoggerHelper } from '../common/utils/logger.helper';
import { ENRICHMENT_DEFAULTS } from '../config/enrichment.config';
import { DatasetIoService } from '../dataset/dataset-io.service';
import { EnrichmentOrchestrator } from '../enrichment/enrichment-orchestrator.service';
import { EnrichmentOutcome } from '../enrichment/enrichment.types';
import { EnrichmentObserver } from '../enrichment/interfaces/enrichment-observer.interface';
import { LoggingEnrichmentObserver } from '../enrichment/observers/logging-enrichment.observer';
import { logEnrichmentSample } from './enrichment-report';

export interface EnrichCommandInput {
  input: string;
  output: string;
  limit?: number;
}

/**
 * CSV 로드 → 보강 → 저장 → 샘플 출력
 * DatasetIoError는 그대로 전파되어 main에서 종료 코드로 변환된다.
 */
@Injectable()
export class EnrichCommandService {
  private readonly logger = new Logger(EnrichCommandService.name);

  constructor(
    private readonly datasetIo: DatasetIoService,
    private readonly orchestrator: EnrichmentOrchestrator,
  ) {}

  async run(
    command: EnrichCommandInput,
    observer: EnrichmentObserver = new LoggingEnrichmentObserver(),
  ): Promise<EnrichmentOutcome> {
    LoggerHelper.logStart(this.logger, '📄 CSV 보강', command);

    const loaded = await this.datasetIo.load(command.input);
    const dataset =
      command.limit !== undefined
        ? { ...loaded, rows: loaded.rows.slice(0, command.limit) }
        : loaded;
    if (dataset.rows.length < loaded.rows.length) {
      this.logger.log(
        `📌 최대 ${command.limit}개만 처리 (전체 ${loaded.rows.length}개)`,
      );
    }

    const outcome = await this.orchestrator.enrich(dataset, observer);
    await this.datasetIo.write(command.output, outcome.dataset);

    logEnrichmentSample(
      this.logger,
      outcome.dataset,
      ENRICHMENT_DEFAULTS.sampleRows,
    );
    LoggerHelper.logComplete(this.logger, '📄 CSV 보강', {
      output: command.output,
      rows: outcome.summary.totalRows,
      failedQueries: outcome.summary.failedQueries,
    });
    return outcome;
  }
}
