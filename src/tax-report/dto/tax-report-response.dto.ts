// Amounts are strings rounded to 2 places, rates are full precision.

export interface CostLegDto {
  buyTradeId: string;
  acquiredAt: string;              // ISO timestamp of the buy
  quantity: number;
  unitPrice: string;
  cost: string;
  rate: string;                    // rate on the buy date
  reportingCost: string;
}

export interface SaleReportDto {
  tradeId: string;
  symbol: string;
  soldAt: string;
  quantity: number;
  unitPrice: string;
  proceeds: string;
  costBasis: string;
  profit: string;
  rate: string;                    // rate on the sale date
  reportingProceeds: string;
  reportingCostBasis: string;
  reportingProfit: string;
  legs: CostLegDto[];
}

export interface RemainingLotDto {
  tradeId: string;
  symbol: string;
  acquiredAt: string;
  quantity: number;
  unitPrice: string;
}

export interface WithholdingDto {
  date: string;
  symbol: string;
  description: string;
  amount: string;
}

export interface DividendReportDto {
  date: string;
  symbol: string;
  description: string;
  gross: string;
  withheld: string;
  net: string;
  rate: string;
  reportingGross: string;
  reportingWithheld: string;
  reportingNet: string;
  withholdings: WithholdingDto[];
}

export interface TaxReportTotalsDto {
  proceeds: string;
  costBasis: string;
  profit: string;
  reportingProceeds: string;
  reportingCostBasis: string;
  reportingProfit: string;
  dividendsGross: string;
  dividendsWithheld: string;
  dividendsNet: string;
  reportingDividendsGross: string;
  reportingDividendsWithheld: string;
  reportingDividendsNet: string;
}

// Complete report for one batch
export interface TaxReportResponseDto {
  tradeCurrency: string;
  reportingCurrency: string;
  taxYear: number | null;
  sales: SaleReportDto[];
  remainingLots: RemainingLotDto[];
  dividends: DividendReportDto[];
  orphanWithholdings: WithholdingDto[];
  totals: TaxReportTotalsDto;
}
