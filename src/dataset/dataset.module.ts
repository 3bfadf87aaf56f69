import { Module } from '@nestjs/common';
import { DatasetIoService } from './dataset-io.service';

@Module({
  providers: [DatasetIoService],
  exports: [DatasetIoService],
})
export class DatasetModule {}
