// src/config/enrichment.config.ts
// ✅ 배치 운영값(딜레이/기본 파일/모델)을 단일 소스로 관리

export const GEMINI_API_BASE_URL =
  'https://generativelanguage.googleapis.com/v1beta';

export const GEMINI_DEFAULTS = {
  model: 'gemini-1.5-flash',
  timeoutMs: 30_000,
} as const;

export const ENRICHMENT_DEFAULTS = {
  // 모델 호출 사이 고정 간격 (무료 티어 RPM 대응)
  interCallDelayMs: 5_000,
  inputFile: 'Game_Thumbnail.csv',
  outputFile: 'Game_Thumbnail_New.csv',
  // 완료 후 콘솔에 출력할 샘플 행 수
  sampleRows: 5,
} as const;
