import Decimal from 'decimal.js';
import { InvalidRecordError, RateNotFoundError } from '../common/errors/tax-domain.errors';
import { addDays, DateKey, daysBetween, toDateKey } from '../common/utils/date.util';
import { RateCoverage, RateSample } from './entities/rate-sample.entity';

/**
 * Daily exchange rates, built once and read-only afterwards.
 *
 * Days between two published samples (weekends, holidays) carry the earlier
 * sample's rate. Nothing is extrapolated before the first or after the last
 * sample: such lookups throw RateNotFoundError.
 */
export class ExchangeRateTable {
  private constructor(
    private readonly rates: ReadonlyMap<DateKey, Decimal>,
    private readonly bounds: RateCoverage | null,
  ) {}

  static empty(): ExchangeRateTable {
    return new ExchangeRateTable(new Map(), null);
  }

  /**
   * Builds the complete daily map from samples in ascending date order.
   * @throws InvalidRecordError on unordered or duplicate dates, or a non-positive rate
   */
  static fromSamples(samples: readonly RateSample[]): ExchangeRateTable {
    const rates = new Map<DateKey, Decimal>();
    let previous: RateSample | undefined;

    samples.forEach((sample, index) => {
      if (sample.rate.lte(0)) {
        throw new InvalidRecordError('rate sample', index + 1, [`rate must be positive, got ${sample.rate.toString()}`]);
      }

      if (previous) {
        const gap = daysBetween(previous.date, sample.date);
        if (gap < 1) {
          throw new InvalidRecordError('rate sample', index + 1, [
            `date ${sample.date} does not follow ${previous.date}`,
          ]);
        }
        // forward-fill
        for (let offset = 1; offset < gap; offset++) {
          rates.set(addDays(previous.date, offset), previous.rate);
        }
      }

      rates.set(sample.date, sample.rate);
      previous = sample;
    });

    if (samples.length === 0) {
      return ExchangeRateTable.empty();
    }

    const firstDate = samples[0].date;
    const lastDate = samples[samples.length - 1].date;
    return new ExchangeRateTable(rates, { firstDate, lastDate, days: rates.size });
  }

  /**
   * Rate effective on a calendar day. A Date is taken by its UTC day.
   * @throws RateNotFoundError outside [firstDate, lastDate] or when empty
   */
  rateFor(date: DateKey | Date): Decimal {
    const key = typeof date === 'string' ? date : toDateKey(date);
    const rate = this.rates.get(key);
    if (!rate) {
      throw new RateNotFoundError(key, this.bounds);
    }
    return rate;
  }

  coverage(): RateCoverage | null {
    return this.bounds;
  }
}
