import { Result } from '../../common/types/result';
import { AttributeKind } from '../attribute-kind';

export const MODEL_SERVICE = Symbol('MODEL_SERVICE');

export type QueryFailureReason = 'request-failed' | 'empty-response' | 'blocked';

/**
 * 모델 호출 한 건의 실패
 * 던지지 않고 Result의 error 쪽으로 전달된다.
 */
export interface QueryFailure {
  reason: QueryFailureReason;
  message: string;
  /** 오케스트레이터가 채운다 (모델 서비스는 어떤 속성인지 모름) */
  kind?: AttributeKind;
  gameTitle?: string;
  cause?: unknown;
}

/**
 * 생성형 모델 경계
 * 구현체는 실패를 예외가 아닌 err(QueryFailure)로 돌려준다.
 */
export interface ModelService {
  generate(prompt: string): Promise<Result<string, QueryFailure>>;
}
