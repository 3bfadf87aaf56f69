/**
 * 🛡️ 배치 전역 에러 코드
 * 종료 코드/로그 분류 기준으로만 사용한다.
 */
export enum ErrorCodes {
  // 설정 관련
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',

  // CSV 입출력 관련
  DATASET_IO_ERROR = 'DATASET_IO_ERROR',
}
