import { InvalidRecordError } from '../common/errors/tax-domain.errors';
import { parseFeedDate } from '../common/utils/date.util';
import { toDecimal } from '../common/utils/decimal.util';
import { RateSample } from './entities/rate-sample.entity';

const RATE_PATTERN = /^\d+(\.\d+)?$/;

/**
 * Parses the flat daily-rate feed: one `DD.MM.YYYY<TAB>rate` sample per line.
 * Rates may use a decimal comma and space thousands separators ("1 062,9471").
 * Blank lines are skipped.
 */
export function parseRateFeed(text: string): RateSample[] {
  const samples: RateSample[] = [];

  text.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === '') {
      return;
    }
    const lineNumber = index + 1;
    const fields = line.split('\t');
    if (fields.length !== 2) {
      throw new InvalidRecordError('rate feed line', lineNumber, [`expected date<TAB>rate, got "${line}"`]);
    }

    const [dateField, rateField] = fields;
    const date = parseFeedDate(dateField);
    const rateText = rateField.replace(/\s/g, '').replace(',', '.');
    const reasons: string[] = [];
    if (!date) {
      reasons.push(`unparseable date "${dateField.trim()}"`);
    }
    if (!RATE_PATTERN.test(rateText)) {
      reasons.push(`unparseable rate "${rateField.trim()}"`);
    }
    if (!date || reasons.length > 0) {
      throw new InvalidRecordError('rate feed line', lineNumber, reasons);
    }

    samples.push({ date, rate: toDecimal(rateText) });
  });

  return samples;
}
