import { Module } from '@nestjs/common';
import { DividendsModule } from '../dividends/dividends.module';
import { ExchangeRateModule } from '../exchange-rate/exchange-rate.module';
import { IngestionModule } from '../ingestion/ingestion.module';
import { LotsModule } from '../lots/lots.module';
import { TaxReportController } from './tax-report.controller';
import { TaxReportService } from './tax-report.service';

@Module({
  imports: [IngestionModule, LotsModule, DividendsModule, ExchangeRateModule],
  controllers: [TaxReportController],
  providers: [TaxReportService],
})
export class TaxReportModule {}
