import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Decimal from 'decimal.js';
import { AppConfig } from '../config/config.schema';
import { toDateKey, yearOf } from '../common/utils/date.util';
import { sum, toMoney, toPlain, valuate } from '../common/utils/decimal.util';
import { DividendReconcilerService } from '../dividends/dividend-reconciler.service';
import { DividendReconciliation } from '../dividends/entities/dividend-reconciliation.entity';
import { MoneyFlowCategory, MoneyFlowEvent } from '../dividends/entities/money-flow.entity';
import { ExchangeRateTable } from '../exchange-rate/exchange-rate-table';
import { ExchangeRateService } from '../exchange-rate/exchange-rate.service';
import { RecordNormalizerService } from '../ingestion/record-normalizer.service';
import { BuyLot } from '../lots/entities/buy-lot.entity';
import { SaleMatchResult } from '../lots/entities/sale-match.entity';
import { Trade } from '../lots/entities/trade.entity';
import { LotMatcherService } from '../lots/lot-matcher.service';
import { TaxReportRequestDto } from './dto/tax-report-request.dto';
import {
  DividendReportDto,
  RemainingLotDto,
  SaleReportDto,
  TaxReportResponseDto,
  TaxReportTotalsDto,
  WithholdingDto,
} from './dto/tax-report-response.dto';
import { CostLeg, DividendIncome, SaleProfit } from './entities/sale-profit.entity';

// Realized profit in trade and reporting currency.
// Every leg converts at the rate of the day its own cash flow happened.
@Injectable()
export class TaxReportService {
  private readonly logger = new Logger(TaxReportService.name);

  constructor(
    private readonly normalizer: RecordNormalizerService,
    private readonly lotMatcher: LotMatcherService,
    private readonly dividendReconciler: DividendReconcilerService,
    private readonly exchangeRateService: ExchangeRateService,
    private readonly config: ConfigService<AppConfig, true>,
  ) {}

  /**
   * Proceeds convert at the sale-date rate, each cost fragment at the rate
   * of its original buy date.
   *
   * @throws RateNotFoundError when any needed date is outside the table
   */
  computeSaleProfit(match: SaleMatchResult, rates: ExchangeRateTable): SaleProfit {
    const { sale } = match;
    const saleRate = rates.rateFor(sale.executionTimestamp);
    const proceeds = valuate(match.amount, sale.unitPrice);
    const reportingProceeds = valuate(match.amount, sale.unitPrice, saleRate);

    const legs: CostLeg[] = match.soldBuyings.map((fragment) => {
      const rate = rates.rateFor(fragment.acquiredAt);
      return {
        fragment,
        cost: valuate(fragment.quantity, fragment.unitPrice),
        rate,
        reportingCost: valuate(fragment.quantity, fragment.unitPrice, rate),
      };
    });

    const costBasis = sum(legs.map((leg) => leg.cost));
    const reportingCostBasis = sum(legs.map((leg) => leg.reportingCost));

    return {
      match,
      proceeds,
      costBasis,
      profit: proceeds.minus(costBasis),
      saleRate,
      reportingProceeds,
      reportingCostBasis,
      reportingProfit: reportingProceeds.minus(reportingCostBasis),
      legs,
    };
  }

  /** Converts a reconciled dividend at the rate of its payment date */
  computeDividendIncome(reconciliation: DividendReconciliation, rates: ExchangeRateTable): DividendIncome {
    const rate = rates.rateFor(reconciliation.dividend.date);
    return {
      reconciliation,
      rate,
      reportingGross: reconciliation.gross.times(rate),
      reportingWithheld: reconciliation.withheld.times(rate),
      reportingNet: reconciliation.net.times(rate),
    };
  }

  /**
   * Full batch: normalize, sort chronologically, match lots, reconcile
   * dividends, convert. Any domain error aborts the whole report.
   */
  generateReport(request: TaxReportRequestDto): TaxReportResponseDto {
    const normalized = this.normalizer.normalizeTrades(request.trades);
    const trades = this.sortChronologically(this.normalizer.applySplits(normalized, request.splits ?? []));
    const dividends = this.normalizer.normalizeMoneyFlows(request.dividends ?? [], MoneyFlowCategory.DIVIDEND);
    const withholdings = this.normalizer.normalizeMoneyFlows(request.withholdings ?? [], MoneyFlowCategory.WITHHOLDING);

    const rates =
      request.exchangeRates && request.exchangeRates.length > 0
        ? this.exchangeRateService.buildTable(request.exchangeRates)
        : this.exchangeRateService.getTable();

    const { sales, remainingLots } = this.lotMatcher.match(trades);
    const { records, orphanWithholdings } = this.dividendReconciler.reconcile(dividends, withholdings);

    const taxYear = request.taxYear ?? null;
    const inYear = (dateKey: string) => taxYear === null || yearOf(dateKey) === taxYear;

    const saleProfits = sales
      .filter((match) => inYear(toDateKey(match.sale.executionTimestamp)))
      .map((match) => this.computeSaleProfit(match, rates));
    const dividendIncome = records
      .filter((record) => inYear(record.dividend.date))
      .map((record) => this.computeDividendIncome(record, rates));
    const orphans = orphanWithholdings.filter((withholding) => inYear(withholding.date));

    const totals = this.computeTotals(saleProfits, dividendIncome);
    this.logger.log(
      `Report${taxYear === null ? '' : ` for ${taxYear}`}: ${trades.length} trades, ${saleProfits.length} sales, ` +
        `${remainingLots.length} open lots, ${dividendIncome.length} dividends; ` +
        `realized ${totals.profit} ${this.tradeCurrency()} / ${totals.reportingProfit} ${this.reportingCurrency()}`,
    );

    return {
      tradeCurrency: this.tradeCurrency(),
      reportingCurrency: this.reportingCurrency(),
      taxYear,
      sales: saleProfits.map((profit) => this.toSaleReport(profit)),
      remainingLots: remainingLots.map((lot) => this.toRemainingLot(lot)),
      dividends: dividendIncome.map((income) => this.toDividendReport(income)),
      orphanWithholdings: orphans.map((withholding) => this.toWithholding(withholding)),
      totals,
    };
  }

  // Same-time trades are ordered by symbol; within a symbol they keep input order.
  private sortChronologically(trades: Trade[]): Trade[] {
    return [...trades].sort((a, b) => {
      const byTime = a.executionTimestamp.getTime() - b.executionTimestamp.getTime();
      if (byTime !== 0) {
        return byTime;
      }
      return a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0;
    });
  }

  private computeTotals(saleProfits: SaleProfit[], dividendIncome: DividendIncome[]): TaxReportTotalsDto {
    const total = <T>(items: T[], pick: (item: T) => Decimal): string => toMoney(sum(items.map(pick)));
    return {
      proceeds: total(saleProfits, (p) => p.proceeds),
      costBasis: total(saleProfits, (p) => p.costBasis),
      profit: total(saleProfits, (p) => p.profit),
      reportingProceeds: total(saleProfits, (p) => p.reportingProceeds),
      reportingCostBasis: total(saleProfits, (p) => p.reportingCostBasis),
      reportingProfit: total(saleProfits, (p) => p.reportingProfit),
      dividendsGross: total(dividendIncome, (d) => d.reconciliation.gross),
      dividendsWithheld: total(dividendIncome, (d) => d.reconciliation.withheld),
      dividendsNet: total(dividendIncome, (d) => d.reconciliation.net),
      reportingDividendsGross: total(dividendIncome, (d) => d.reportingGross),
      reportingDividendsWithheld: total(dividendIncome, (d) => d.reportingWithheld),
      reportingDividendsNet: total(dividendIncome, (d) => d.reportingNet),
    };
  }

  private toSaleReport(profit: SaleProfit): SaleReportDto {
    const { sale } = profit.match;
    return {
      tradeId: sale.id,
      symbol: sale.symbol,
      soldAt: sale.executionTimestamp.toISOString(),
      quantity: profit.match.amount,
      unitPrice: toPlain(sale.unitPrice),
      proceeds: toMoney(profit.proceeds),
      costBasis: toMoney(profit.costBasis),
      profit: toMoney(profit.profit),
      rate: toPlain(profit.saleRate),
      reportingProceeds: toMoney(profit.reportingProceeds),
      reportingCostBasis: toMoney(profit.reportingCostBasis),
      reportingProfit: toMoney(profit.reportingProfit),
      legs: profit.legs.map((leg) => ({
        buyTradeId: leg.fragment.buyTradeId,
        acquiredAt: leg.fragment.acquiredAt.toISOString(),
        quantity: leg.fragment.quantity,
        unitPrice: toPlain(leg.fragment.unitPrice),
        cost: toMoney(leg.cost),
        rate: toPlain(leg.rate),
        reportingCost: toMoney(leg.reportingCost),
      })),
    };
  }

  private toRemainingLot(lot: BuyLot): RemainingLotDto {
    return {
      tradeId: lot.tradeId,
      symbol: lot.symbol,
      acquiredAt: lot.acquiredAt.toISOString(),
      quantity: lot.quantity,
      unitPrice: toPlain(lot.unitPrice),
    };
  }

  private toDividendReport(income: DividendIncome): DividendReportDto {
    const { dividend, withholdings, gross, withheld, net } = income.reconciliation;
    return {
      date: dividend.date,
      symbol: dividend.symbol,
      description: dividend.description,
      gross: toMoney(gross),
      withheld: toMoney(withheld),
      net: toMoney(net),
      rate: toPlain(income.rate),
      reportingGross: toMoney(income.reportingGross),
      reportingWithheld: toMoney(income.reportingWithheld),
      reportingNet: toMoney(income.reportingNet),
      withholdings: withholdings.map((withholding) => this.toWithholding(withholding)),
    };
  }

  private toWithholding(withholding: MoneyFlowEvent): WithholdingDto {
    return {
      date: withholding.date,
      symbol: withholding.symbol,
      description: withholding.description,
      amount: toMoney(withholding.amount),
    };
  }

  private tradeCurrency(): string {
    return this.config.get('TRADE_CURRENCY', { infer: true });
  }

  private reportingCurrency(): string {
    return this.config.get('REPORTING_CURRENCY', { infer: true });
  }
}
