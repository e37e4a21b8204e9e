import Decimal from 'decimal.js';

// Unsold remainder of a buy trade.
// Owned by a single matching run; quantity only ever decreases.
export interface BuyLot {
  readonly tradeId: string;
  readonly symbol: string;
  quantity: number;
  readonly unitPrice: Decimal;         // cost basis per share
  readonly acquiredAt: Date;
}
