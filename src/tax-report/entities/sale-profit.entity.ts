import Decimal from 'decimal.js';
import { DividendReconciliation } from '../../dividends/entities/dividend-reconciliation.entity';
import { SaleMatchResult, SoldFragment } from '../../lots/entities/sale-match.entity';

// Cost of one funding fragment, converted at the rate of its buy date.
export interface CostLeg {
  fragment: SoldFragment;
  cost: Decimal;
  rate: Decimal;
  reportingCost: Decimal;
}

// Realized result of one sale in trade and reporting currency.
export interface SaleProfit {
  match: SaleMatchResult;
  proceeds: Decimal;            // sale price × amount
  costBasis: Decimal;           // Σ fragment price × fragment quantity
  profit: Decimal;
  saleRate: Decimal;            // rate on the sale date
  reportingProceeds: Decimal;
  reportingCostBasis: Decimal;  // Σ per-leg, each at its own buy-date rate
  reportingProfit: Decimal;
  legs: CostLeg[];
}

export interface DividendIncome {
  reconciliation: DividendReconciliation;
  rate: Decimal;                // rate on the dividend date
  reportingGross: Decimal;
  reportingWithheld: Decimal;
  reportingNet: Decimal;
}
