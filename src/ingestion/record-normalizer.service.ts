import { Injectable } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { v4 as uuidv4 } from 'uuid';
import { InvalidRecordError } from '../common/errors/tax-domain.errors';
import { isDateKey, parseTimestamp, toDateKey } from '../common/utils/date.util';
import { toDecimal } from '../common/utils/decimal.util';
import { MoneyFlowCategory, MoneyFlowEvent } from '../dividends/entities/money-flow.entity';
import { Trade, TradeSide } from '../lots/entities/trade.entity';
import { createTrade } from '../lots/trade.factory';
import { MoneyFlowRecordDto } from './dto/money-flow-record.dto';
import { SplitAdjustmentDto } from './dto/split-adjustment.dto';
import { TradeRecordDto } from './dto/trade-record.dto';

// Ingestion boundary: raw broker rows in, typed records out.
// Every row is validated once here; the core never sees a malformed field.
@Injectable()
export class RecordNormalizerService {
  /**
   * Validates trade rows and classifies side by the sign of quantity.
   * @throws InvalidRecordError naming the 1-based row and every failed rule
   */
  normalizeTrades(rows: readonly object[]): Trade[] {
    return rows.map((row, index) => {
      const position = index + 1;
      const record = this.validate(TradeRecordDto, row, 'trade', position);

      const executionTimestamp = parseTimestamp(record.dateTime);
      if (!executionTimestamp) {
        throw new InvalidRecordError('trade', position, [`unparseable dateTime "${record.dateTime}"`]);
      }

      return createTrade(
        {
          id: record.tradeId,
          symbol: record.symbol,
          side: record.quantity < 0 ? TradeSide.SELL : TradeSide.BUY,
          quantity: Math.abs(record.quantity),
          unitPrice: toDecimal(record.price),
          executionTimestamp,
        },
        position,
      );
    });
  }

  /**
   * Validates dividend or withholding rows.
   * Symbol comes from the row, or from the description up to the first "(".
   */
  normalizeMoneyFlows(rows: readonly object[], category: MoneyFlowCategory): MoneyFlowEvent[] {
    return rows.map((row, index) => {
      const position = index + 1;
      const record = this.validate(MoneyFlowRecordDto, row, category, position);

      const reasons: string[] = [];
      if (!isDateKey(record.date)) {
        reasons.push(`date ${record.date} is not a calendar date`);
      }
      const symbol = (record.symbol ?? record.description.split('(')[0]).trim();
      if (symbol === '') {
        reasons.push(`no symbol in description "${record.description}"`);
      }
      if (reasons.length > 0) {
        throw new InvalidRecordError(category, position, reasons);
      }

      return {
        id: uuidv4(),
        date: record.date,
        symbol,
        description: record.description,
        amount: toDecimal(record.amount),
        category,
      };
    });
  }

  /**
   * Restates pre-split trades in post-split units: quantity × ratio,
   * unit price ÷ ratio. Returns new trades, keeping ids.
   */
  applySplits(trades: readonly Trade[], splits: readonly SplitAdjustmentDto[]): Trade[] {
    splits.forEach((split, index) => {
      if (!isDateKey(split.effectiveDate) || !Number.isSafeInteger(split.ratio) || split.ratio <= 0) {
        throw new InvalidRecordError('split', index + 1, [
          `expected a calendar effectiveDate and a positive integer ratio, got ${split.effectiveDate} / ${split.ratio}`,
        ]);
      }
    });

    return trades.map((trade, index) => {
      const ratio = splits
        .filter((split) => split.symbol === trade.symbol && toDateKey(trade.executionTimestamp) < split.effectiveDate)
        .reduce((product, split) => product * split.ratio, 1);

      if (ratio === 1) {
        return trade;
      }
      return createTrade(
        {
          ...trade,
          quantity: trade.quantity * ratio,
          unitPrice: trade.unitPrice.dividedBy(ratio),
        },
        index + 1,
      );
    });
  }

  private validate<T extends object>(cls: ClassConstructor<T>, row: object, kind: string, position: number): T {
    const record = plainToInstance(cls, row);
    const errors = validateSync(record);
    if (errors.length > 0) {
      const reasons = errors.flatMap((error) => Object.values(error.constraints ?? {}));
      throw new InvalidRecordError(kind, position, reasons);
    }
    return record;
  }
}
