import Decimal from 'decimal.js';

// Configure Decimal.js globally for money arithmetic.
// 40 significant digits keep quantity * price * rate exact for any realistic trade.
Decimal.set({
  precision: 40,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

/**
 * Converts any number-like value to Decimal for financial calculations.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Renders a money amount with 2 decimal places.
 * The only place where rounding happens - internal sums stay exact.
 */
export function toMoney(value: Decimal): string {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toFixed(2);
}

/** Full-precision plain notation, e.g. for exchange rates. */
export function toPlain(value: Decimal): string {
  return value.toFixed();
}

/**
 * Safe addition of Decimal values.
 */
export function sum(values: Iterable<Decimal>): Decimal {
  let total = new Decimal(0);
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}

/** Value of `quantity` units at `unitPrice`, converted at `rate` when given. */
export function valuate(quantity: number, unitPrice: Decimal, rate?: Decimal): Decimal {
  const value = unitPrice.times(quantity);
  return rate ? value.times(rate) : value;
}
