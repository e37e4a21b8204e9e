import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { AppController } from './app.controller';
import { TaxDomainExceptionFilter } from './common/filters/tax-domain-exception.filter';
import { validateConfig } from './config/config.schema';
import { ExchangeRateModule } from './exchange-rate/exchange-rate.module';
import { TaxReportModule } from './tax-report/tax-report.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateConfig,
    }),
    ExchangeRateModule, // AppController reports rate coverage in /health
    TaxReportModule,
  ],
  controllers: [AppController],
  providers: [{ provide: APP_FILTER, useClass: TaxDomainExceptionFilter }],
})
export class AppModule {}
