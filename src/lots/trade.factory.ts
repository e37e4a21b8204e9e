import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { InvalidRecordError } from '../common/errors/tax-domain.errors';
import { Trade, TradeSide } from './entities/trade.entity';

export interface TradeInit {
  id?: string;
  symbol: string;
  side: TradeSide;
  quantity: number;
  unitPrice: Decimal;
  executionTimestamp: Date;
}

/**
 * Creates a validated, frozen trade.
 * A zero, negative or fractional quantity never reaches the matcher.
 *
 * @param position - index reported in InvalidRecordError
 */
export function createTrade(init: TradeInit, position = 1): Trade {
  const reasons: string[] = [];
  if (init.symbol.trim() === '') {
    reasons.push('symbol must not be empty');
  }
  if (!Number.isSafeInteger(init.quantity) || init.quantity <= 0) {
    reasons.push(`quantity must be a positive integer, got ${init.quantity}`);
  }
  if (init.unitPrice.isNegative() || !init.unitPrice.isFinite()) {
    reasons.push(`unit price must be a non-negative amount, got ${init.unitPrice.toString()}`);
  }
  if (Number.isNaN(init.executionTimestamp.getTime())) {
    reasons.push('execution timestamp is not a valid date');
  }
  if (reasons.length > 0) {
    throw new InvalidRecordError('trade', position, reasons);
  }

  return Object.freeze({
    id: init.id ?? uuidv4(),
    symbol: init.symbol,
    side: init.side,
    quantity: init.quantity,
    unitPrice: init.unitPrice,
    executionTimestamp: init.executionTimestamp,
  });
}
