import { Logger } from '@nestjs/common';
import { EnrichedDataset } from '../dataset/dataset.types';

/**
 * 완료 후 샘플 출력 (game_title / genre / player_mode 상위 n개 + 첫 행 설명)
 */
export function formatSampleTable(
  dataset: EnrichedDataset,
  sampleRows: number,
): string[] {
  const columns = ['game_title', 'genre', 'player_mode'] as const;
  const sample = dataset.rows.slice(0, sampleRows);
  const widths = columns.map((column) =>
    Math.max(column.length, ...sample.map((row) => row[column].length)),
  );

  const line = (cells: readonly string[]) =>
    cells.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd();

  return [line(columns), ...sample.map((row) => line(columns.map((c) => row[c])))];
}

export function logEnrichmentSample(
  logger: Logger,
  dataset: EnrichedDataset,
  sampleRows: number,
): void {
  if (dataset.rows.length === 0) {
    logger.log('ℹ️ 출력할 샘플이 없습니다 (0행)');
    return;
  }

  logger.log('Sample of enhanced data:');
  logger.log('-'.repeat(60));
  for (const line of formatSampleTable(dataset, sampleRows)) {
    logger.log(line);
  }

  const first = dataset.rows[0];
  logger.log('First game description sample:');
  logger.log(`Game: ${first.game_title}`);
  logger.log(`Description: ${first.short_description}`);
}
