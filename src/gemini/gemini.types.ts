// Gemini generateContent REST 타입 (사용하는 필드만)

export interface GeminiPart {
  text?: string;
}

export interface GeminiContent {
  role?: 'user' | 'model';
  parts: GeminiPart[];
}

export interface GeminiGenerateContentRequest {
  contents: GeminiContent[];
  generationConfig?: {
    temperature?: number;
    maxOutputTokens?: number;
  };
}

export interface GeminiCandidate {
  content?: GeminiContent;
  finishReason?: string;
}

export interface GeminiGenerateContentResponse {
  candidates?: GeminiCandidate[];
  promptFeedback?: {
    blockReason?: string;
  };
}

/** CLI 등에서 환경 변수보다 우선 적용하는 값 */
export interface GeminiOverrides {
  apiKey?: string;
  model?: string;
}

export const GEMINI_OVERRIDES = Symbol('GEMINI_OVERRIDES');
