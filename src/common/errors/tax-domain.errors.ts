/**
 * Base class for data-correctness errors raised by the tax computation.
 * None of them are transient: the batch stops and the offending record is
 * reported back for manual correction.
 */
export abstract class TaxDomainError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown>;

  constructor(message: string, code: string, details: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;
  }
}

/**
 * A sale exceeds the prior same-symbol buy quantity.
 * Usually a missing transfer-in or an incomplete set of reports.
 */
export class InsufficientLotsError extends TaxDomainError {
  constructor(
    public readonly symbol: string,
    public readonly shortfall: number,
    sale: { executionTimestamp: Date; quantity: number },
  ) {
    super(
      `Not enough buy lots for ${symbol}: sale of ${sale.quantity} on ${sale.executionTimestamp.toISOString()} is short by ${shortfall}`,
      'INSUFFICIENT_LOTS',
      {
        symbol,
        shortfall,
        saleQuantity: sale.quantity,
        saleTimestamp: sale.executionTimestamp.toISOString(),
      },
    );
  }
}

/** Requested date is outside the exchange rate table's coverage. */
export class RateNotFoundError extends TaxDomainError {
  constructor(
    public readonly date: string,
    coverage: { firstDate: string; lastDate: string } | null,
  ) {
    super(
      coverage
        ? `No exchange rate for ${date}: table covers ${coverage.firstDate}..${coverage.lastDate}`
        : `No exchange rate for ${date}: table is empty`,
      'RATE_NOT_FOUND',
      { date, coverage },
    );
  }
}

// Malformed upstream record, rejected before it reaches the core.
export class InvalidRecordError extends TaxDomainError {
  constructor(
    public readonly recordKind: string,
    public readonly position: number,
    public readonly reasons: string[],
  ) {
    super(
      `Invalid ${recordKind} #${position}: ${reasons.join('; ')}`,
      'INVALID_RECORD',
      { recordKind, position, reasons },
    );
  }
}
