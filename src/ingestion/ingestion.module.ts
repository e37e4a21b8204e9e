import { Module } from '@nestjs/common';
import { RecordNormalizerService } from './record-normalizer.service';

@Module({
  providers: [RecordNormalizerService],
  exports: [RecordNormalizerService],
})
export class IngestionModule {}
