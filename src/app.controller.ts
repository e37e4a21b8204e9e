import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { ExchangeRateService } from './exchange-rate/exchange-rate.service';

@Controller()
export class AppController {
  constructor(private readonly exchangeRateService: ExchangeRateService) {}

  /**
   * Health check for load balancers and monitoring.
   * 
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'fifo-tax-lots',
      ratesLoaded: this.exchangeRateService.getCoverage().coverage !== null,
    };
  }

  /**
   * API root - returns service info and available endpoints.
   * 
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'FIFO Tax Lots API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        taxReport: '/tax-report',
        exchangeRates: '/exchange-rates',
        exchangeRate: '/exchange-rates/:date',
      },
    };
  }
}
