import { parseRateFeed } from './rate-feed.parser';
import { InvalidRecordError } from '../common/errors/tax-domain.errors';

describe('parseRateFeed', () => {
  it('should parse tab-separated lines with a decimal comma', () => {
    const samples = parseRateFeed('27.07.2018\t62,9471\n31.07.2018\t63,1000\n');

    expect(samples.map((s) => [s.date, s.rate.toString()])).toEqual([
      ['2018-07-27', '62.9471'],
      ['2018-07-31', '63.1'],
    ]);
  });

  it('should drop spaces used as thousands separators', () => {
    const [sample] = parseRateFeed('01.08.2018\t1 063,25');
    expect(sample.rate.toString()).toBe('1063.25');
  });

  it('should accept a decimal point and CRLF line endings', () => {
    const samples = parseRateFeed('27.07.2018\t62.9471\r\n30.07.2018\t63\r\n');
    expect(samples.map((s) => s.rate.toString())).toEqual(['62.9471', '63']);
  });

  it('should skip blank lines', () => {
    expect(parseRateFeed('\n27.07.2018\t62,9471\n\n   \n')).toHaveLength(1);
  });

  it('should reject an unparseable date with its line number', () => {
    expect(() => parseRateFeed('27.07.2018\t62,9471\n2018-07-28\t63,0')).toThrow(
      'Invalid rate feed line #2: unparseable date "2018-07-28"',
    );
  });

  it('should reject an impossible calendar date', () => {
    expect(() => parseRateFeed('30.02.2019\t65,0')).toThrow(InvalidRecordError);
  });

  it('should reject a line without a tab', () => {
    expect(() => parseRateFeed('27.07.2018 62,9471')).toThrow('expected date<TAB>rate');
  });

  it('should reject a malformed rate', () => {
    expect(() => parseRateFeed('27.07.2018\tn/a')).toThrow('unparseable rate "n/a"');
  });
});
