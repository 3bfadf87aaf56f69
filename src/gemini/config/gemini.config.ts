// src/gemini/config/gemini.config.ts
// 응답 길이/온도 등 호출 파라미터. 모델/키/URL은 환경 변수에서.

export const GEMINI_GENERATION_CONFIG = {
  temperature: 0.2,
  // 설명(30단어 이하)에도 충분한 상한
  maxOutputTokens: 128,
} as const;

export const GEMINI_USER_AGENT = 'GameAttributeEnricher/1.0';
