/**
 * 모델 응답 정규화 유틸리티
 *
 * 규칙:
 * 1. genre: 공백 기준 첫 토큰만 사용 (장르 목록 검증 없음)
 * 2. description: 30단어 초과 시 29단어 + 마침표
 * 3. player_mode: 부분 문자열 우선순위(single → multi → both) 후 정확 일치, 기본값 Both
 */

import { Result } from '../../common/types/result';
import {
  ATTRIBUTE_FALLBACKS,
  AttributeKind,
  PLAYER_MODES,
  PlayerMode,
} from '../attribute-kind';
import { QueryFailure } from '../interfaces/model-service.interface';

const MAX_DESCRIPTION_WORDS = 30;
const TRUNCATED_DESCRIPTION_WORDS = 29;

/**
 * @example
 * normalizeGenre("Strategy game.") // "Strategy"
 * normalizeGenre("  RPG\n") // "RPG"
 */
export function normalizeGenre(raw: string): string {
  const genre = raw.trim();
  const tokens = genre.split(/\s+/);
  return tokens.length > 1 ? tokens[0] : genre;
}

export function normalizeDescription(raw: string): string {
  const description = raw.trim();
  const words = description.split(/\s+/).filter((w) => w.length > 0);
  if (words.length > MAX_DESCRIPTION_WORDS) {
    return words.slice(0, TRUNCATED_DESCRIPTION_WORDS).join(' ') + '.';
  }
  return description;
}

function isPlayerMode(value: string): value is PlayerMode {
  return (PLAYER_MODES as readonly string[]).includes(value);
}

export function normalizePlayerMode(raw: string): PlayerMode {
  const mode = raw.trim();
  const lowered = mode.toLowerCase();

  if (lowered.includes('single')) return 'Singleplayer';
  if (lowered.includes('multi') && !lowered.includes('both')) {
    return 'Multiplayer';
  }
  if (lowered.includes('both')) return 'Both';

  // 위 규칙상 도달하지 않지만 정확 일치 단계는 유지
  if (isPlayerMode(mode)) return mode;

  return 'Both';
}

const NORMALIZERS: Record<AttributeKind, (raw: string) => string> = {
  [AttributeKind.Genre]: normalizeGenre,
  [AttributeKind.Description]: normalizeDescription,
  [AttributeKind.PlayerMode]: normalizePlayerMode,
};

export function normalizeResponse(kind: AttributeKind, raw: string): string {
  return NORMALIZERS[kind](raw);
}

/**
 * 모델 호출 결과를 최종 필드 값으로 변환
 * 실패(err)면 속성별 대체값을 쓴다.
 */
export function resolveAttribute(
  kind: AttributeKind,
  result: Result<string, QueryFailure>,
): string {
  if (!result.ok) return ATTRIBUTE_FALLBACKS[kind];
  return normalizeResponse(kind, result.value);
}
