import { Injectable } from '@nestjs/common';
import { InsufficientLotsError } from '../common/errors/tax-domain.errors';
import { BuyLot } from './entities/buy-lot.entity';
import { LotMatchOutcome, SaleMatchResult, SoldFragment } from './entities/sale-match.entity';
import { Trade, TradeSide } from './entities/trade.entity';

// FIFO matching of sales against prior buys of the same symbol.
// Pure and synchronous: the caller's trades are never touched, all
// quantity bookkeeping happens on lot copies owned by one call.
@Injectable()
export class LotMatcherService {
  /**
   * Funds every sale, in the given order, from that symbol's buy lots in the
   * given order. Callers sort by execution time to get chronological FIFO.
   *
   * @throws InsufficientLotsError when a sale outruns the available buys
   */
  match(trades: readonly Trade[]): LotMatchOutcome {
    const sales = trades.filter((trade) => trade.side === TradeSide.SELL);
    const lots: BuyLot[] = trades
      .filter((trade) => trade.side === TradeSide.BUY)
      .map((trade) => ({
        tradeId: trade.id,
        symbol: trade.symbol,
        quantity: trade.quantity,
        unitPrice: trade.unitPrice,
        acquiredAt: trade.executionTimestamp,
      }));

    // per-symbol queues, oldest first
    const queues = new Map<string, BuyLot[]>();
    for (const lot of lots) {
      const queue = queues.get(lot.symbol);
      if (queue) {
        queue.push(lot);
      } else {
        queues.set(lot.symbol, [lot]);
      }
    }

    const results = sales.map((sale) => this.fundSale(sale, queues.get(sale.symbol) ?? []));

    return {
      sales: results,
      remainingLots: lots.filter((lot) => lot.quantity > 0),
    };
  }

  // Consumes lots from the front of the queue; supports partial lots.
  private fundSale(sale: Trade, queue: BuyLot[]): SaleMatchResult {
    let remaining = sale.quantity;
    const soldBuyings: SoldFragment[] = [];

    while (remaining > 0 && queue.length > 0) {
      const oldestLot = queue[0];
      const take = Math.min(remaining, oldestLot.quantity);

      soldBuyings.push({
        buyTradeId: oldestLot.tradeId,
        quantity: take,
        unitPrice: oldestLot.unitPrice,
        acquiredAt: oldestLot.acquiredAt,
      });

      oldestLot.quantity -= take;
      remaining -= take;

      if (oldestLot.quantity === 0) {
        queue.shift();
      }
    }

    if (remaining > 0) {
      throw new InsufficientLotsError(sale.symbol, remaining, sale);
    }

    return { sale, amount: sale.quantity, soldBuyings };
  }
}
