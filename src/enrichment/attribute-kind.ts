import { EnrichedColumn } from '../dataset/dataset.types';

export enum AttributeKind {
  Genre = 'genre',
  Description = 'description',
  PlayerMode = 'player_mode',
}

/** 행마다 질의하는 순서 */
export const ATTRIBUTE_ORDER: readonly AttributeKind[] = [
  AttributeKind.Genre,
  AttributeKind.Description,
  AttributeKind.PlayerMode,
];

export const PLAYER_MODES = ['Singleplayer', 'Multiplayer', 'Both'] as const;
export type PlayerMode = (typeof PLAYER_MODES)[number];

/** 프롬프트에서 제시하는 장르 목록 (응답 검증에는 쓰지 않음) */
export const GENRE_VOCABULARY = [
  'Action',
  'RPG',
  'Sports',
  'Strategy',
  'Simulation',
  'Adventure',
  'Puzzle',
  'Racing',
  'Fighting',
  'Horror',
  'Platformer',
  'Shooter',
  'MMORPG',
  'Sandbox',
  'Card',
] as const;

/** 모델 호출 실패 시 대체값 */
export const ATTRIBUTE_FALLBACKS: Record<AttributeKind, string> = {
  [AttributeKind.Genre]: 'Unknown',
  [AttributeKind.Description]: 'A video game experience.',
  [AttributeKind.PlayerMode]: 'Both',
};

export const ATTRIBUTE_COLUMNS: Record<AttributeKind, EnrichedColumn> = {
  [AttributeKind.Genre]: 'genre',
  [AttributeKind.Description]: 'short_description',
  [AttributeKind.PlayerMode]: 'player_mode',
};

export const ATTRIBUTE_LABELS: Record<AttributeKind, string> = {
  [AttributeKind.Genre]: 'Genre',
  [AttributeKind.Description]: 'Description',
  [AttributeKind.PlayerMode]: 'Player Mode',
};
