import { Injectable, Logger } from '@nestjs/common';
import { sum, toDecimal } from '../common/utils/decimal.util';
import { DividendReconciliation, ReconciliationOutcome } from './entities/dividend-reconciliation.entity';
import { MoneyFlowEvent } from './entities/money-flow.entity';

/**
 * Joins dividends with withholding tax entries on exact (symbol, date).
 * No nearest-date matching: a withholding on another day stays an orphan.
 * When several dividends share a key, the first in input order takes that
 * key's withholdings and the later ones get none.
 */
@Injectable()
export class DividendReconcilerService {
  private readonly logger = new Logger(DividendReconcilerService.name);

  reconcile(dividends: readonly MoneyFlowEvent[], withholdings: readonly MoneyFlowEvent[]): ReconciliationOutcome {
    const byKey = new Map<string, MoneyFlowEvent[]>();
    for (const withholding of withholdings) {
      const key = this.joinKey(withholding);
      const group = byKey.get(key);
      if (group) {
        group.push(withholding);
      } else {
        byKey.set(key, [withholding]);
      }
    }

    const claimed = new Set<string>();
    const records = dividends.map((dividend) => {
      const key = this.joinKey(dividend);
      if (claimed.has(key)) {
        return this.toRecord(dividend, []);
      }
      claimed.add(key);
      return this.toRecord(dividend, byKey.get(key) ?? []);
    });

    const orphanWithholdings = withholdings.filter((withholding) => !claimed.has(this.joinKey(withholding)));

    if (orphanWithholdings.length > 0) {
      this.logger.warn(
        `${orphanWithholdings.length} withholding(s) have no dividend on the same symbol and date: ` +
          orphanWithholdings.map((w) => `${w.symbol} ${w.date} ${w.amount.toString()}`).join(', '),
      );
    }

    return { records, orphanWithholdings };
  }

  private toRecord(dividend: MoneyFlowEvent, withholdings: MoneyFlowEvent[]): DividendReconciliation {
    // unsigned zero when nothing was withheld
    const withheld = toDecimal(0).minus(sum(withholdings.map((w) => w.amount)));
    return {
      dividend,
      withholdings: [...withholdings],
      gross: dividend.amount,
      withheld,
      net: dividend.amount.minus(withheld),
    };
  }

  private joinKey(event: MoneyFlowEvent): string {
    return `${event.symbol}\u0000${event.date}`;
  }
}
