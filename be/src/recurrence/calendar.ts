import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import utc from 'dayjs/plugin/utc.js';
import type { IsoDate } from './types.js';

// utc has to be extended last so strict parsing formats in UTC.
dayjs.extend(customParseFormat);
dayjs.extend(utc);

const MONTH_EPOCH = dayjs.utc('2000-01-01');
const MONTH_EPOCH_INDEX = 2000 * 12;

export const ISO_DATE_FORMAT = 'YYYY-MM-DD';

/**
 * Strictly parses a `YYYY-MM-DD` string into a UTC day. Returns null for
 * anything that does not format back to the same string: impossible days
 * (2023-02-29, 2024-13-01) and years below 100, which Date would shift.
 */
export function parseIsoDate(value: string): dayjs.Dayjs | null {
  const parsed = dayjs.utc(value, ISO_DATE_FORMAT, true);
  return parsed.isValid() ? parsed : null;
}

export function formatIsoDate(date: dayjs.Dayjs): IsoDate {
  return date.format(ISO_DATE_FORMAT);
}

/** Months since year 0, so month arithmetic is plain integer arithmetic. */
export function monthIndexOf(date: dayjs.Dayjs): number {
  return date.year() * 12 + date.month();
}

/**
 * The `dayOfMonth`-th day of the month at `monthIndex`, clamped to the last
 * day when the month is shorter.
 */
export function dayInMonth(monthIndex: number, dayOfMonth: number): dayjs.Dayjs {
  const base = MONTH_EPOCH.add(monthIndex - MONTH_EPOCH_INDEX, 'month');
  return base.date(Math.min(dayOfMonth, base.daysInMonth()));
}

export function addIsoDays(date: IsoDate, days: number): IsoDate {
  const parsed = parseIsoDate(date);
  if (!parsed) {
    throw new Error(`Invalid date: ${date}`);
  }
  return formatIsoDate(parsed.add(days, 'day'));
}

/** Whole days from `from` to `to`; negative when `to` comes first. */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  const start = parseIsoDate(from);
  const end = parseIsoDate(to);
  if (!start || !end) {
    throw new Error(`Invalid date range: ${from} to ${to}`);
  }
  return end.diff(start, 'day');
}

export function isIsoDate(value: unknown): value is IsoDate {
  return typeof value === 'string' && parseIsoDate(value) !== null;
}
