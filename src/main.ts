#!/usr/bin/env node
// src/main.ts
import 'reflect-metadata';
import 'dotenv/config';
import { NestFactory } from '@nestjs/core';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { EnrichCommandService } from './cli/enrich-command.service';
import { parseCliOptions } from './cli/enrich-cli.options';
import { existsSync } from 'fs';
import {
  ConfigurationError,
  DatasetIoError,
  isEnricherError,
} from './common/errors/enricher.errors';
import { LoggerHelper } from './common/utils/logger.helper';

const logger = new Logger('GameEnricher');

function banner(title: string): void {
  logger.log('='.repeat(60));
  logger.log(title);
  logger.log('='.repeat(60));
}

async function bootstrap(argv: readonly string[]): Promise<number> {
  banner('Video Game Data Enhancement');

  let app: INestApplicationContext | undefined;
  try {
    const options = parseCliOptions(argv);

    // 입력 파일이 없으면 API 설정 전에 바로 종료
    if (!existsSync(options.input)) {
      throw new DatasetIoError(
        `입력 파일 '${options.input}'을 찾을 수 없습니다`,
        options.input,
        'read',
      );
    }

    app = await NestFactory.createApplicationContext(
      AppModule.forRoot({
        interCallDelayMs: options.delayMs,
        gemini: { apiKey: options.apiKey, model: options.model },
      }),
      { logger: ['error', 'warn', 'log'], abortOnError: false },
    );
    logger.log('✅ Gemini API 설정 완료');

    await app.get(EnrichCommandService).run({
      input: options.input,
      output: options.output,
      limit: options.limit,
    });

    banner('Script execution completed successfully!');
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      LoggerHelper.logError(logger, '⚙️ 설정 오류', error);
    } else if (error instanceof DatasetIoError) {
      LoggerHelper.logError(logger, `📄 CSV ${error.operation}`, error, {
        path: error.path,
      });
    } else if (isEnricherError(error)) {
      LoggerHelper.logError(logger, error.code, error);
    } else {
      LoggerHelper.logError(logger, '❌ 예기치 못한 오류', error);
    }
    return 1;
  } finally {
    await app?.close();
  }
}

bootstrap(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    LoggerHelper.logError(logger, '❌ 종료 처리', error);
    process.exitCode = 1;
  });
