import { Injectable, Logger } from '@nestjs/common';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { DatasetIoError } from '../common/errors/enricher.errors';
import {
  ErrorHandlerUtil,
  toErrorMessage,
} from '../common/utils/error-handler.util';
import { Dataset, EnrichedDataset, Row, TITLE_COLUMN } from './dataset.types';

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every((v) => typeof v === 'string')
  );
}

/**
 * CSV ↔ Dataset 변환
 * - 읽기: 헤더 필수, game_title 컬럼 필수
 * - 쓰기: dataset.columns 순서 그대로, 상위 디렉터리 자동 생성
 */
@Injectable()
export class DatasetIoService {
  private readonly logger = new Logger(DatasetIoService.name);

  async load(path: string): Promise<Dataset> {
    const content = await ErrorHandlerUtil.rethrowAs(
      () => readFile(path, 'utf8'),
      (error) =>
        new DatasetIoError(
          `입력 파일을 읽을 수 없습니다: ${toErrorMessage(error)}`,
          path,
          'read',
          { cause: error },
        ),
    );

    const dataset = this.parse(content, path);
    this.logger.log(`📥 ${dataset.rows.length}개 게임 로드 완료 (${path})`);
    return dataset;
  }

  parse(content: string, path = '<memory>'): Dataset {
    let columns: string[] = [];
    let parsed: unknown;
    try {
      parsed = parse(content, {
        bom: true,
        skip_empty_lines: true,
        columns: (header: string[]) => {
          columns = header.map((h) => h.trim());
          return columns;
        },
      });
    } catch (error) {
      throw new DatasetIoError(
        `CSV 파싱 실패: ${toErrorMessage(error)}`,
        path,
        'read',
        { cause: error },
      );
    }

    if (!columns.includes(TITLE_COLUMN)) {
      throw new DatasetIoError(
        `'${TITLE_COLUMN}' 컬럼이 없습니다 (컬럼: ${columns.join(', ') || '없음'})`,
        path,
        'read',
      );
    }

    const records = Array.isArray(parsed) ? parsed.filter(isStringRecord) : [];
    const rows = records.map(
      (record): Row => ({ ...record, [TITLE_COLUMN]: record[TITLE_COLUMN] ?? '' }),
    );
    return { columns, rows };
  }

  serialize(dataset: EnrichedDataset): string {
    return stringify(dataset.rows, {
      header: true,
      columns: dataset.columns,
    });
  }

  async write(path: string, dataset: EnrichedDataset): Promise<void> {
    await ErrorHandlerUtil.rethrowAs(
      async () => {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, this.serialize(dataset), 'utf8');
      },
      (error) =>
        new DatasetIoError(
          `출력 파일을 쓸 수 없습니다: ${toErrorMessage(error)}`,
          path,
          'write',
          { cause: error },
        ),
    );
    this.logger.log(`💾 ${dataset.rows.length}개 행 저장 완료 (${path})`);
  }
}
