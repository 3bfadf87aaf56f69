import { EnrichedDataset } from '../dataset/dataset.types';
import { AttributeKind } from './attribute-kind';

export const ENRICHMENT_OPTIONS = Symbol('ENRICHMENT_OPTIONS');

export type Sleeper = (ms: number) => Promise<void>;

export interface EnrichmentOptions {
  /** 모델 호출 직후 매번 대기하는 시간 (마지막 호출 포함) */
  interCallDelayMs: number;
  /** 테스트에서 교체 가능한 대기 함수 */
  sleep?: Sleeper;
}

export interface EnrichmentSummary {
  totalRows: number;
  totalQueries: number;
  failedQueries: number;
  fallbackCounts: Record<AttributeKind, number>;
  elapsedMs: number;
}

export interface EnrichmentOutcome {
  dataset: EnrichedDataset;
  summary: EnrichmentSummary;
}
