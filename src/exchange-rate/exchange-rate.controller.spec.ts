import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExchangeRateController } from './exchange-rate.controller';
import { ExchangeRateService } from './exchange-rate.service';
import { toDecimal } from '../common/utils/decimal.util';

describe('ExchangeRateController', () => {
  let controller: ExchangeRateController;
  let service: ExchangeRateService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [ExchangeRateController],
      providers: [
        ExchangeRateService,
        {
          provide: ConfigService,
          useValue: new ConfigService({ TRADE_CURRENCY: 'USD', REPORTING_CURRENCY: 'RUB' }),
        },
      ],
    }).compile();

    controller = module.get<ExchangeRateController>(ExchangeRateController);
    service = module.get<ExchangeRateService>(ExchangeRateService);
  });

  describe('getCoverage', () => {
    it('should report an empty table', () => {
      expect(controller.getCoverage()).toEqual({
        source: null,
        firstDate: null,
        lastDate: null,
        days: 0,
        currencyPair: 'USD/RUB',
      });
    });

    it('should report loaded coverage', () => {
      service.useSamples(
        [
          { date: '2019-01-09', rate: toDecimal('67') },
          { date: '2019-01-11', rate: toDecimal('66.85') },
        ],
        'inline',
      );

      expect(controller.getCoverage()).toEqual({
        source: 'inline',
        firstDate: '2019-01-09',
        lastDate: '2019-01-11',
        days: 3,
        currencyPair: 'USD/RUB',
      });
    });
  });

  describe('getRate', () => {
    beforeEach(() => {
      service.useSamples([{ date: '2018-07-27', rate: toDecimal('62.9471') }], 'inline');
    });

    it('should return the rate at full precision', () => {
      expect(controller.getRate('2018-07-27')).toEqual({
        date: '2018-07-27',
        rate: '62.9471',
        currencyPair: 'USD/RUB',
      });
    });

    it('should answer 404 outside the coverage', () => {
      expect(() => controller.getRate('2018-07-28')).toThrow(NotFoundException);
    });

    it('should answer 400 for a malformed date', () => {
      expect(() => controller.getRate('27.07.2018')).toThrow(BadRequestException);
    });
  });
});
