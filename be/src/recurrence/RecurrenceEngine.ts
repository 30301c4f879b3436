import type dayjs from 'dayjs';
import { dayInMonth, formatIsoDate, monthIndexOf, parseIsoDate } from './calendar.js';
import { InvalidWindowError } from './errors.js';
import type { RecurrenceRule } from './RecurrenceRule.js';
import { SEMI_MONTHLY_DAYS, IsoDate } from './types.js';

type Series = {
  at: (index: number) => dayjs.Dayjs;
  firstIndexOnOrAfter: (date: dayjs.Dayjs) => number;
};

function buildSeries(rule: RecurrenceRule): Series {
  const anchor = rule.anchorDay;
  const cadence = rule.cadence;
  const anchorMonth = monthIndexOf(anchor);

  switch (cadence.kind) {
    case 'days':
      return {
        at: (index) => anchor.add(index * cadence.stepDays, 'day'),
        firstIndexOnOrAfter: (date) => Math.max(0, Math.ceil(date.diff(anchor, 'day') / cadence.stepDays)),
      };
    case 'months': {
      const at = (index: number) => dayInMonth(anchorMonth + index * cadence.stepMonths, cadence.dayOfMonth);
      return {
        at,
        firstIndexOnOrAfter: (date) => {
          let index = Math.max(0, Math.floor((monthIndexOf(date) - anchorMonth) / cadence.stepMonths));
          while (at(index).isBefore(date, 'day')) {
            index += 1;
          }
          return index;
        },
      };
    }
    case 'semi_monthly': {
      const at = (index: number) =>
        dayInMonth(anchorMonth + Math.floor(index / 2) * cadence.stepMonths, SEMI_MONTHLY_DAYS[index % 2]);
      return {
        at,
        firstIndexOnOrAfter: (date) => {
          let index = 2 * Math.max(0, Math.floor((monthIndexOf(date) - anchorMonth) / cadence.stepMonths));
          while (at(index).isBefore(date, 'day')) {
            index += 1;
          }
          return index;
        },
      };
    }
  }
}

function parseWindowBound(value: IsoDate, windowStart: IsoDate, windowEnd: IsoDate): dayjs.Dayjs {
  const parsed = parseIsoDate(value);
  if (!parsed) {
    throw new InvalidWindowError(windowStart, windowEnd, `Invalid window date: ${value}`);
  }
  return parsed;
}

function* iterateSeries(
  series: Series,
  firstIndex: number,
  windowEnd: dayjs.Dayjs,
  indexLimit: number | null,
  until: dayjs.Dayjs | null,
): Generator<IsoDate, void, undefined> {
  for (let index = firstIndex; indexLimit === null || index < indexLimit; index += 1) {
    const occurrence = series.at(index);
    if (occurrence.isAfter(windowEnd, 'day')) {
      return;
    }
    if (until && occurrence.isAfter(until, 'day')) {
      return;
    }
    yield formatIsoDate(occurrence);
  }
}

/**
 * Lazily expands `rule` into its occurrence dates inside
 * `[windowStart, windowEnd]` (both inclusive), in increasing order.
 *
 * A `count` end condition limits the whole series counted from its first
 * occurrence, so occurrences before `windowStart` still use up the count.
 * Window errors are thrown here, before the first value is produced.
 */
export function generateOccurrences(
  rule: RecurrenceRule,
  windowStart: IsoDate,
  windowEnd: IsoDate,
): Generator<IsoDate, void, undefined> {
  const start = parseWindowBound(windowStart, windowStart, windowEnd);
  const end = parseWindowBound(windowEnd, windowStart, windowEnd);
  if (end.isBefore(start, 'day')) {
    throw new InvalidWindowError(windowStart, windowEnd);
  }

  const series = buildSeries(rule);
  const endCondition = rule.endCondition;
  const indexLimit = endCondition.type === 'count' ? endCondition.count : null;
  const until = endCondition.type === 'until' ? parseIsoDate(endCondition.date) : null;

  return iterateSeries(series, series.firstIndexOnOrAfter(start), end, indexLimit, until);
}

export function listOccurrences(rule: RecurrenceRule, windowStart: IsoDate, windowEnd: IsoDate): IsoDate[] {
  return Array.from(generateOccurrences(rule, windowStart, windowEnd));
}

/** First date of the series; for semi-monthly rules the 1st of the anchor's month. */
export function seriesStart(rule: RecurrenceRule): IsoDate {
  return formatIsoDate(buildSeries(rule).at(0));
}

export const RecurrenceEngine = {
  generate: generateOccurrences,
  list: listOccurrences,
  seriesStart,
} as const;
