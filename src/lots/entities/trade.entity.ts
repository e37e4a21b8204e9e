import Decimal from 'decimal.js';

export enum TradeSide {
  BUY = 'buy',
  SELL = 'sell',
}

// Normalized trade execution. Prices are in the single trade currency.
// Never mutated after creation - lot matching works on its own copies.
export interface Trade {
  readonly id: string;                 // broker trade ID or generated UUID
  readonly symbol: string;             // exact, case-sensitive
  readonly side: TradeSide;
  readonly quantity: number;           // positive whole shares
  readonly unitPrice: Decimal;
  readonly executionTimestamp: Date;
}
