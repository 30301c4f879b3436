import type dayjs from 'dayjs';
import { formatIsoDate, parseIsoDate } from './calendar.js';
import { InvalidRuleError } from './errors.js';
import {
  isRecurrenceFrequency,
  RecurrenceCadence,
  RecurrenceEndCondition,
  RecurrenceFrequency,
  IsoDate,
} from './types.js';

function assertNever(value: never): never {
  throw new InvalidRuleError('frequency', `Unsupported frequency: ${String(value)}`);
}

function cadenceFor(frequency: RecurrenceFrequency, interval: number, anchor: dayjs.Dayjs): RecurrenceCadence {
  switch (frequency) {
    case 'daily':
      return { kind: 'days', stepDays: interval };
    case 'weekly':
      return { kind: 'days', stepDays: 7 * interval };
    case 'biweekly':
      return { kind: 'days', stepDays: 14 * interval };
    case 'monthly':
      return { kind: 'months', stepMonths: interval, dayOfMonth: anchor.date() };
    case 'quarterly':
      return { kind: 'months', stepMonths: 3 * interval, dayOfMonth: anchor.date() };
    case 'semi_annually':
      return { kind: 'months', stepMonths: 6 * interval, dayOfMonth: anchor.date() };
    case 'yearly':
      return { kind: 'months', stepMonths: 12 * interval, dayOfMonth: anchor.date() };
    case 'semi_monthly':
      return { kind: 'semi_monthly', stepMonths: interval };
    default:
      return assertNever(frequency);
  }
}

function normalizeEndCondition(endCondition: RecurrenceEndCondition, anchor: dayjs.Dayjs): RecurrenceEndCondition {
  switch (endCondition.type) {
    case 'never':
      return { type: 'never' };
    case 'until': {
      const until = parseIsoDate(endCondition.date);
      if (!until) {
        throw new InvalidRuleError('endCondition', `Invalid until date: ${endCondition.date}`);
      }
      if (until.isBefore(anchor, 'day')) {
        throw new InvalidRuleError(
          'endCondition',
          `Until date ${endCondition.date} is earlier than anchor date ${formatIsoDate(anchor)}`,
        );
      }
      return { type: 'until', date: formatIsoDate(until) };
    }
    case 'count': {
      if (!Number.isInteger(endCondition.count) || endCondition.count < 1) {
        throw new InvalidRuleError('endCondition', 'Occurrence count must be a positive integer');
      }
      return { type: 'count', count: endCondition.count };
    }
    default:
      throw new InvalidRuleError('endCondition', 'Unknown end condition');
  }
}

/**
 * Immutable description of a repeating obligation. Only `create` builds one,
 * so every instance satisfies the rule invariants.
 */
export class RecurrenceRule {
  readonly frequency: RecurrenceFrequency;
  readonly anchorDate: IsoDate;
  /** `anchorDate` parsed as a UTC day. */
  readonly anchorDay: dayjs.Dayjs;
  readonly interval: number;
  readonly endCondition: Readonly<RecurrenceEndCondition>;
  readonly cadence: Readonly<RecurrenceCadence>;

  private constructor(
    frequency: RecurrenceFrequency,
    anchorDay: dayjs.Dayjs,
    interval: number,
    endCondition: RecurrenceEndCondition,
    cadence: RecurrenceCadence,
  ) {
    this.frequency = frequency;
    this.anchorDate = formatIsoDate(anchorDay);
    this.anchorDay = anchorDay;
    this.interval = interval;
    this.endCondition = Object.freeze(endCondition);
    this.cadence = Object.freeze(cadence);
    Object.freeze(this);
  }

  static create(
    frequency: RecurrenceFrequency | string,
    anchorDate: IsoDate,
    interval = 1,
    endCondition: RecurrenceEndCondition = { type: 'never' },
  ): RecurrenceRule {
    if (!isRecurrenceFrequency(frequency)) {
      throw new InvalidRuleError('frequency', `Unsupported frequency: ${frequency}`);
    }
    const anchor = parseIsoDate(anchorDate);
    if (!anchor) {
      throw new InvalidRuleError('anchorDate', `Invalid anchor date: ${anchorDate}`);
    }
    if (!Number.isInteger(interval) || interval < 1) {
      throw new InvalidRuleError('interval', 'Interval must be a positive integer');
    }

    return new RecurrenceRule(
      frequency,
      anchor,
      interval,
      normalizeEndCondition(endCondition, anchor),
      cadenceFor(frequency, interval, anchor),
    );
  }
}
