import * as fs from 'node:fs';
import * as path from 'node:path';
import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Decimal from 'decimal.js';
import { AppConfig } from '../config/config.schema';
import { InvalidRecordError } from '../common/errors/tax-domain.errors';
import { DateKey, isDateKey } from '../common/utils/date.util';
import { toDecimal } from '../common/utils/decimal.util';
import { RateSampleDto } from './dto/rate-sample.dto';
import { RateCoverage, RateSample } from './entities/rate-sample.entity';
import { ExchangeRateTable } from './exchange-rate-table';
import { parseRateFeed } from './rate-feed.parser';

/**
 * Holds the process-wide exchange rate table.
 * Built eagerly from the configured daily feed at module init and shared
 * read-only afterwards; loading a new feed swaps in a new table.
 */
@Injectable()
export class ExchangeRateService implements OnModuleInit {
  private readonly logger = new Logger(ExchangeRateService.name);
  private table: ExchangeRateTable = ExchangeRateTable.empty();
  private source: string | null = null;

  constructor(private readonly config: ConfigService<AppConfig, true>) {}

  onModuleInit(): void {
    this.loadFromFile(this.config.get('RATE_FEED_PATH', { infer: true }));
  }

  /**
   * Reads and builds the table from a feed file.
   * A missing file leaves an empty table (every lookup then fails).
   */
  loadFromFile(feedPath: string): ExchangeRateTable {
    const fullPath = path.resolve(process.cwd(), feedPath);
    if (!fs.existsSync(fullPath)) {
      this.logger.warn(`Rate feed not found at ${fullPath}; conversions will fail until rates are supplied`);
      return this.table;
    }

    const samples = parseRateFeed(fs.readFileSync(fullPath, 'utf-8'));
    return this.useSamples(samples, fullPath);
  }

  /** Replaces the shared table with one built from `samples` */
  useSamples(samples: readonly RateSample[], source: string): ExchangeRateTable {
    this.table = ExchangeRateTable.fromSamples(samples);
    this.source = source;

    const coverage = this.table.coverage();
    if (coverage) {
      this.logger.log(
        `Loaded ${samples.length} rate samples from ${source} (${coverage.firstDate}..${coverage.lastDate}, ${coverage.days} days)`,
      );
    } else {
      this.logger.warn(`Rate source ${source} has no samples`);
    }
    return this.table;
  }

  /**
   * Builds a standalone table from inline samples, leaving the shared one as is.
   * @throws InvalidRecordError for a date that is not a calendar day
   */
  buildTable(samples: readonly RateSampleDto[]): ExchangeRateTable {
    return ExchangeRateTable.fromSamples(
      samples.map((sample, index) => {
        if (!isDateKey(sample.date)) {
          throw new InvalidRecordError('rate sample', index + 1, [`date ${sample.date} is not a calendar date`]);
        }
        return { date: sample.date, rate: toDecimal(sample.rate) };
      }),
    );
  }

  getTable(): ExchangeRateTable {
    return this.table;
  }

  /** @throws RateNotFoundError outside the table's coverage */
  rateFor(date: DateKey | Date): Decimal {
    return this.table.rateFor(date);
  }

  getCoverage(): { source: string | null; coverage: RateCoverage | null } {
    return { source: this.source, coverage: this.table.coverage() };
  }
}
