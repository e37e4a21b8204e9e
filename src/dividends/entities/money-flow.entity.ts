import Decimal from 'decimal.js';
import { DateKey } from '../../common/utils/date.util';

export enum MoneyFlowCategory {
  DIVIDEND = 'dividend',
  WITHHOLDING = 'withholding',
}

// Cash dividend or withholding tax posting from a broker report.
export interface MoneyFlowEvent {
  readonly id: string;
  readonly date: DateKey;
  readonly symbol: string;
  readonly description: string;        // broker text, e.g. "VOO(US9229083632) Cash Dividend"
  readonly amount: Decimal;            // signed - withholdings are negative
  readonly category: MoneyFlowCategory;
}
