import { ExchangeRateTable } from './exchange-rate-table';
import { RateSample } from './entities/rate-sample.entity';
import { InvalidRecordError, RateNotFoundError } from '../common/errors/tax-domain.errors';
import { toDecimal } from '../common/utils/decimal.util';

describe('ExchangeRateTable', () => {
  const sample = (date: string, rate: string): RateSample => ({ date, rate: toDecimal(rate) });

  describe('fromSamples', () => {
    it('should return the published rate for a sample date', () => {
      const table = ExchangeRateTable.fromSamples([sample('2018-07-27', '62.9471')]);

      expect(table.rateFor('2018-07-27').toString()).toBe('62.9471');
    });

    it('should forward-fill days between samples with the earlier rate', () => {
      const table = ExchangeRateTable.fromSamples([sample('2019-01-11', '66.85'), sample('2019-01-14', '67.10')]);

      expect(table.rateFor('2019-01-12').toString()).toBe('66.85');
      expect(table.rateFor('2019-01-13').toString()).toBe('66.85');
      expect(table.rateFor('2019-01-14').toString()).toBe('67.1');
    });

    it('should fill across month and year boundaries', () => {
      const table = ExchangeRateTable.fromSamples([sample('2019-12-28', '61.9057'), sample('2020-01-09', '61.2340')]);

      expect(table.rateFor('2020-01-05').toString()).toBe('61.9057');
      expect(table.coverage()).toEqual({ firstDate: '2019-12-28', lastDate: '2020-01-09', days: 13 });
    });

    it('should build identical tables from the same samples', () => {
      const samples = [sample('2019-03-01', '65.8'), sample('2019-03-05', '65.9'), sample('2019-03-06', '65.7')];

      const first = ExchangeRateTable.fromSamples(samples);
      const second = ExchangeRateTable.fromSamples(samples);
      const days = ['2019-03-01', '2019-03-02', '2019-03-03', '2019-03-04', '2019-03-05', '2019-03-06'];

      expect(days.map((day) => second.rateFor(day).toString())).toEqual(days.map((day) => first.rateFor(day).toString()));
      expect(days.map((day) => first.rateFor(day).toString())).toEqual(['65.8', '65.8', '65.8', '65.8', '65.9', '65.7']);
      expect(second.coverage()).toEqual(first.coverage());
    });

    it('should reject out-of-order and duplicate dates', () => {
      expect(() => ExchangeRateTable.fromSamples([sample('2019-03-05', '1'), sample('2019-03-01', '1')])).toThrow(
        InvalidRecordError,
      );
      expect(() => ExchangeRateTable.fromSamples([sample('2019-03-05', '1'), sample('2019-03-05', '2')])).toThrow(
        'Invalid rate sample #2: date 2019-03-05 does not follow 2019-03-05',
      );
    });

    it('should reject a non-positive rate', () => {
      expect(() => ExchangeRateTable.fromSamples([sample('2019-03-05', '0')])).toThrow('rate must be positive, got 0');
    });
  });

  describe('rateFor', () => {
    const table = ExchangeRateTable.fromSamples([sample('2019-01-09', '67'), sample('2019-01-10', '66.9')]);

    it('should take a Date by its UTC calendar day', () => {
      expect(table.rateFor(new Date('2019-01-10T23:59:59Z')).toString()).toBe('66.9');
    });

    it('should fail before the first sample', () => {
      expect(() => table.rateFor('2019-01-08')).toThrow(RateNotFoundError);
    });

    it('should fail after the last sample instead of extrapolating', () => {
      expect(() => table.rateFor('2019-01-11')).toThrow(
        'No exchange rate for 2019-01-11: table covers 2019-01-09..2019-01-10',
      );
    });

    it('should fail on an empty table', () => {
      expect(() => ExchangeRateTable.fromSamples([]).rateFor('2019-01-09')).toThrow(
        'No exchange rate for 2019-01-09: table is empty',
      );
      expect(ExchangeRateTable.empty().coverage()).toBeNull();
    });
  });
});
