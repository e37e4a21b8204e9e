// Calendar dates travel as 'YYYY-MM-DD' keys; timestamps are Date values read as UTC.
export type DateKey = string;

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const BROKER_TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}),\s*(\d{2}):(\d{2}):(\d{2})$/;
const FEED_DATE_PATTERN = /^(\d{2})\.(\d{2})\.(\d{4})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

function utcDate(year: number, month: number, day: number): Date | undefined {
  const date = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC rolls 2019-02-30 over into March
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return date;
}

function keyToDate(key: DateKey): Date | undefined {
  const match = DATE_KEY_PATTERN.exec(key);
  if (!match) {
    return undefined;
  }
  return utcDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

export function isDateKey(value: string): boolean {
  return keyToDate(value) !== undefined;
}

/** UTC calendar day of a timestamp */
export function toDateKey(date: Date): DateKey {
  return date.toISOString().slice(0, 10);
}

export function addDays(key: DateKey, days: number): DateKey {
  const date = keyToDate(key);
  if (!date) {
    throw new RangeError(`Not a calendar date: ${key}`);
  }
  return toDateKey(new Date(date.getTime() + days * MS_PER_DAY));
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: DateKey, to: DateKey): number {
  const start = keyToDate(from);
  const end = keyToDate(to);
  if (!start || !end) {
    throw new RangeError(`Not a calendar date: ${start ? to : from}`);
  }
  return Math.round((end.getTime() - start.getTime()) / MS_PER_DAY);
}

export function yearOf(key: DateKey): number {
  return Number(key.slice(0, 4));
}

/**
 * Parses an execution timestamp.
 * Accepts ISO-8601 and the broker form '2019-01-15, 10:11:38' (taken as UTC).
 */
export function parseTimestamp(raw: string): Date | undefined {
  const broker = BROKER_TIMESTAMP_PATTERN.exec(raw.trim());
  if (broker) {
    const [, year, month, day, hours, minutes, seconds] = broker.map(Number);
    const date = utcDate(year, month, day);
    if (!date || hours > 23 || minutes > 59 || seconds > 59) {
      return undefined;
    }
    return new Date(date.getTime() + ((hours * 60 + minutes) * 60 + seconds) * 1000);
  }

  const dateOnly = keyToDate(raw.trim());
  if (dateOnly) {
    return dateOnly;
  }

  // ISO-8601 with a time part; no zone designator means UTC
  const iso = raw.trim();
  if (!/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/.test(iso)) {
    return undefined;
  }
  const hasZone = /(Z|[+-]\d{2}:?\d{2})$/.test(iso);
  const parsed = new Date(hasZone ? iso : `${iso}Z`);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

/** Parses the rate feed's 'DD.MM.YYYY' date. */
export function parseFeedDate(raw: string): DateKey | undefined {
  const match = FEED_DATE_PATTERN.exec(raw.trim());
  if (!match) {
    return undefined;
  }
  const date = utcDate(Number(match[3]), Number(match[2]), Number(match[1]));
  return date ? toDateKey(date) : undefined;
}
