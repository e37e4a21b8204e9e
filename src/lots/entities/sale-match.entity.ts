import Decimal from 'decimal.js';
import { BuyLot } from './buy-lot.entity';
import { Trade } from './trade.entity';

// Part of a buy lot that funded a sale.
export interface SoldFragment {
  readonly buyTradeId: string;
  readonly quantity: number;
  readonly unitPrice: Decimal;         // from the buy lot
  readonly acquiredAt: Date;           // buy date - drives the cost leg's rate
}

// One per sale. Fragment quantities sum exactly to amount.
export interface SaleMatchResult {
  readonly sale: Trade;
  readonly amount: number;
  readonly soldBuyings: readonly SoldFragment[];
}

export interface LotMatchOutcome {
  sales: SaleMatchResult[];            // input order
  remainingLots: BuyLot[];             // original buy order
}
