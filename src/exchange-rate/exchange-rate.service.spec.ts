import * as path from 'node:path';
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { ExchangeRateService } from './exchange-rate.service';
import { InvalidRecordError, RateNotFoundError } from '../common/errors/tax-domain.errors';
import { toDecimal } from '../common/utils/decimal.util';

const FIXTURE_FEED = path.resolve(__dirname, '../../test/fixtures/rates.dat');

describe('ExchangeRateService', () => {
  let service: ExchangeRateService;

  const createService = async (feedPath: string): Promise<ExchangeRateService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ExchangeRateService,
        { provide: ConfigService, useValue: new ConfigService({ RATE_FEED_PATH: feedPath }) },
      ],
    }).compile();

    return module.get<ExchangeRateService>(ExchangeRateService);
  };

  beforeEach(async () => {
    service = await createService(FIXTURE_FEED);
  });

  describe('Initialization', () => {
    it('should start with an empty table until the module is initialized', () => {
      expect(service.getCoverage()).toEqual({ source: null, coverage: null });
      expect(() => service.rateFor('2018-07-27')).toThrow(RateNotFoundError);
    });

    it('should load the configured feed on module init', () => {
      service.onModuleInit();

      expect(service.rateFor('2018-07-27').toString()).toBe('62.9471');
      expect(service.getCoverage()).toEqual({
        source: FIXTURE_FEED,
        coverage: { firstDate: '2018-07-26', lastDate: '2018-08-01', days: 7 },
      });
    });

    it('should keep an empty table when the feed file is missing', async () => {
      const missing = await createService(path.resolve(__dirname, 'no-such-feed.dat'));
      missing.onModuleInit();

      expect(missing.getCoverage().coverage).toBeNull();
    });
  });

  describe('loadFromFile', () => {
    it('should forward-fill weekend gaps from the feed', () => {
      service.loadFromFile(FIXTURE_FEED);

      expect(service.rateFor('2018-07-28').toString()).toBe('62.9471');
      expect(service.rateFor('2018-07-30').toString()).toBe('62.9471');
      expect(service.rateFor(new Date('2018-08-01T12:00:00Z')).toString()).toBe('1063.25');
    });
  });

  describe('useSamples', () => {
    it('should replace the shared table', () => {
      service.loadFromFile(FIXTURE_FEED);
      const previous = service.getTable();

      service.useSamples([{ date: '2020-01-09', rate: toDecimal('61.234') }], 'inline');

      expect(service.getTable()).not.toBe(previous);
      expect(service.getCoverage().source).toBe('inline');
      expect(() => service.rateFor('2018-07-27')).toThrow(RateNotFoundError);
      expect(previous.rateFor('2018-07-27').toString()).toBe('62.9471');
    });
  });

  describe('buildTable', () => {
    it('should build a standalone table without touching the shared one', () => {
      const table = service.buildTable([
        { date: '2019-01-15', rate: '68' },
        { date: '2019-01-18', rate: '69.5' },
      ]);

      expect(table.rateFor('2019-01-17').toString()).toBe('68');
      expect(service.getCoverage().coverage).toBeNull();
    });

    it('should reject a date that is not a calendar day', () => {
      expect(() => service.buildTable([{ date: '2019-02-30', rate: '68' }])).toThrow(InvalidRecordError);
    });
  });
});
