import { Module } from '@nestjs/common';
import { LotMatcherService } from './lot-matcher.service';

@Module({
  providers: [LotMatcherService],
  exports: [LotMatcherService],
})
export class LotsModule {}
