import Decimal from 'decimal.js';
import { DateKey } from '../../common/utils/date.util';

// One published daily rate (reporting currency per unit of trade currency).
export interface RateSample {
  date: DateKey;
  rate: Decimal;
}

export interface RateCoverage {
  firstDate: DateKey;
  lastDate: DateKey;
  days: number;             // calendar days incl. forward-filled ones
}
