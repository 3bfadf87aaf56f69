/**
 * 🛡️ 에러 처리 유틸리티
 * 예외를 Result 값으로 바꾸는 지점을 한 곳으로 모은다.
 */

import { AxiosError, isAxiosError } from 'axios';
import { err, ok, Result } from '../types/result';

/**
 * 던져진 값에서 사람이 읽을 수 있는 메시지를 뽑는다
 * - Axios 에러는 HTTP 상태와 업스트림 메시지를 함께 표기
 */
export function toErrorMessage(error: unknown): string {
  if (isAxiosError(error)) return describeAxiosError(error);
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return error.message;
  }
  return String(error);
}

function describeAxiosError(error: AxiosError): string {
  const status = error.response?.status;
  const data: unknown = error.response?.data;
  let upstream: string | undefined;
  if (typeof data === 'object' && data !== null && 'error' in data) {
    const inner: unknown = data.error;
    if (
      typeof inner === 'object' &&
      inner !== null &&
      'message' in inner &&
      typeof inner.message === 'string'
    ) {
      upstream = inner.message;
    }
  }
  const head = status ? `HTTP ${status}` : error.code ?? 'NETWORK_ERROR';
  return `${head}: ${upstream ?? error.message}`;
}

export class ErrorHandlerUtil {
  /**
   * 🔄 비동기 작업을 실행하고 예외를 Result로 변환
   * - 성공: ok(value)
   * - 실패: err(mapError(error))
   */
  static async captureAsResult<T, E>(
    operation: () => Promise<T>,
    mapError: (error: unknown) => E,
  ): Promise<Result<T, E>> {
    try {
      return ok(await operation());
    } catch (error) {
      return err(mapError(error));
    }
  }

  /**
   * ⚠️ 치명적 에러 래핑
   * 원인 에러를 cause로 보존하며 도메인 에러로 다시 던진다.
   */
  static async rethrowAs<T>(
    operation: () => Promise<T>,
    wrap: (error: unknown) => Error,
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw wrap(error);
    }
  }
}
