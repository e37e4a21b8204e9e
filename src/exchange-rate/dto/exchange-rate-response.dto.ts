// Single-day lookup result
export interface ExchangeRateResponseDto {
  date: string;
  rate: string;                    // full precision
  currencyPair: string;            // e.g. "USD/RUB"
}

// Loaded table coverage
export interface ExchangeRateCoverageDto {
  source: string | null;           // feed path or null when nothing loaded
  firstDate: string | null;
  lastDate: string | null;
  days: number;
  currencyPair: string;
}
