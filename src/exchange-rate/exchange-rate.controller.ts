import { BadRequestException, Controller, Get, HttpCode, HttpStatus, NotFoundException, Param } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/config.schema';
import { RateNotFoundError } from '../common/errors/tax-domain.errors';
import { isDateKey } from '../common/utils/date.util';
import { toPlain } from '../common/utils/decimal.util';
import { ExchangeRateService } from './exchange-rate.service';
import { ExchangeRateCoverageDto, ExchangeRateResponseDto } from './dto/exchange-rate-response.dto';

@Controller('exchange-rates')
export class ExchangeRateController {
  constructor(
    private readonly exchangeRateService: ExchangeRateService,
    private readonly config: ConfigService<AppConfig, true>,
  ) {}

  /**
   * Returns the coverage of the loaded rate table.
   *
   * GET /exchange-rates
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  getCoverage(): ExchangeRateCoverageDto {
    const { source, coverage } = this.exchangeRateService.getCoverage();
    return {
      source,
      firstDate: coverage?.firstDate ?? null,
      lastDate: coverage?.lastDate ?? null,
      days: coverage?.days ?? 0,
      currencyPair: this.currencyPair(),
    };
  }

  /**
   * Rate effective on a calendar day (forward-filled over gaps).
   *
   * GET /exchange-rates/2018-07-27
   * @returns 404 outside the table's coverage
   */
  @Get(':date')
  @HttpCode(HttpStatus.OK)
  getRate(@Param('date') date: string): ExchangeRateResponseDto {
    if (!isDateKey(date)) {
      throw new BadRequestException(`date must be a calendar date in YYYY-MM-DD form, got "${date}"`);
    }

    try {
      const rate = this.exchangeRateService.rateFor(date);
      return { date, rate: toPlain(rate), currencyPair: this.currencyPair() };
    } catch (error) {
      if (error instanceof RateNotFoundError) {
        throw new NotFoundException(error.message);
      }
      throw error;
    }
  }

  private currencyPair(): string {
    const trade = this.config.get('TRADE_CURRENCY', { infer: true });
    const reporting = this.config.get('REPORTING_CURRENCY', { infer: true });
    return `${trade}/${reporting}`;
  }
}
