import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EnrichCommandService } from './cli/enrich-command.service';
import { validateEnvironment } from './config/env.validation';
import { DatasetModule } from './dataset/dataset.module';
import {
  EnrichmentModule,
  EnrichmentModuleOptions,
} from './enrichment/enrichment.module';

@Module({})
export class AppModule {
  static forRoot(options: EnrichmentModuleOptions = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        // .env는 main에서 dotenv/config로 먼저 로드한다
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          validate: validateEnvironment,
        }),
        DatasetModule, // ✅ CSV 입출력
        EnrichmentModule.register(options), // ✅ Gemini 기반 속성 보강
      ],
      providers: [EnrichCommandService],
    };
  }
}
