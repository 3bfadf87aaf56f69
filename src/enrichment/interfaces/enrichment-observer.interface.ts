import { AttributeKind } from '../attribute-kind';
import { EnrichmentSummary } from '../enrichment.types';
import { QueryFailure } from './model-service.interface';

/**
 * 진행 상황 부가 채널. 모든 훅은 선택 사항이며 결과 데이터에 영향을 주지 않는다.
 */
export interface EnrichmentObserver {
  onStart?(totalRows: number): void;
  onRowStart?(index: number, totalRows: number, gameTitle: string): void;
  onAttributeResolved?(index: number, kind: AttributeKind, value: string): void;
  onQueryFailure?(index: number, failure: QueryFailure): void;
  onComplete?(summary: EnrichmentSummary): void;
}
