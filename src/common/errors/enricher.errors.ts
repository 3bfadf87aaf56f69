import { ErrorCodes } from './error-codes';

/**
 * 배치에서 던지는 모든 치명적 에러의 베이스
 * - QueryFailure는 값(Result)으로 흐르므로 여기에 포함되지 않는다.
 */
export abstract class EnricherError extends Error {
  abstract readonly code: ErrorCodes;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** 시작 시점 설정 누락/오류 (API 키, CLI 옵션, 환경 변수) */
export class ConfigurationError extends EnricherError {
  readonly code = ErrorCodes.CONFIGURATION_ERROR;
}

export type DatasetOperation = 'read' | 'write';

/** CSV 읽기/쓰기 실패 */
export class DatasetIoError extends EnricherError {
  readonly code = ErrorCodes.DATASET_IO_ERROR;

  constructor(
    message: string,
    readonly path: string,
    readonly operation: DatasetOperation,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function isEnricherError(error: unknown): error is EnricherError {
  return error instanceof EnricherError;
}
