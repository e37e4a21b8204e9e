import Decimal from 'decimal.js';
import { MoneyFlowEvent } from './money-flow.entity';

// Dividend joined with the withholdings posted for the same symbol and date.
export interface DividendReconciliation {
  readonly dividend: MoneyFlowEvent;
  readonly withholdings: readonly MoneyFlowEvent[];
  readonly gross: Decimal;
  readonly withheld: Decimal;          // negated sum of withholdings, 0 when none
  readonly net: Decimal;               // gross - withheld
}

export interface ReconciliationOutcome {
  records: DividendReconciliation[];               // dividend input order
  orphanWithholdings: MoneyFlowEvent[];            // no dividend on their symbol+date
}
