/**
 * CSV 한 행. 최소한 game_title 컬럼을 가진다.
 */
export type Row = Record<string, string> & { game_title: string };

export interface Dataset {
  /** 원본 컬럼 순서 */
  columns: string[];
  rows: Row[];
}

export const TITLE_COLUMN = 'game_title';

/** 보강 결과로 뒤에 붙는 컬럼 (순서 고정) */
export const ENRICHED_COLUMNS = [
  'genre',
  'short_description',
  'player_mode',
] as const;

export type EnrichedColumn = (typeof ENRICHED_COLUMNS)[number];

export type EnrichedRow = Row & Record<EnrichedColumn, string>;

export interface EnrichedDataset {
  columns: string[];
  rows: EnrichedRow[];
}

/**
 * 입력 컬럼 뒤에 보강 컬럼을 붙인다.
 * 이미 존재하는 컬럼은 제자리에 두고 중복 추가하지 않는다.
 */
export function appendEnrichedColumns(columns: readonly string[]): string[] {
  const result = [...columns];
  for (const column of ENRICHED_COLUMNS) {
    if (!result.includes(column)) result.push(column);
  }
  return result;
}
