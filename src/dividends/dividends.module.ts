import { Module } from '@nestjs/common';
import { DividendReconcilerService } from './dividend-reconciler.service';

@Module({
  providers: [DividendReconcilerService],
  exports: [DividendReconcilerService],
})
export class DividendsModule {}
