export const RECURRENCE_FREQUENCIES = [
  'daily',
  'weekly',
  'biweekly',
  'monthly',
  'semi_monthly',
  'quarterly',
  'semi_annually',
  'yearly',
] as const;

export type RecurrenceFrequency = (typeof RECURRENCE_FREQUENCIES)[number];

/** Calendar date in `YYYY-MM-DD` form. */
export type IsoDate = string;

export type RecurrenceEndCondition =
  | { type: 'never' }
  | { type: 'until'; date: IsoDate }
  | { type: 'count'; count: number };

export type RecurrenceEndType = RecurrenceEndCondition['type'];

/**
 * How a frequency steps through the calendar. Each kind carries only what its
 * stepping needs: day-based cadences never clamp, semi-monthly never looks at
 * the anchor's day.
 */
export type RecurrenceCadence =
  | { kind: 'days'; stepDays: number }
  | { kind: 'months'; stepMonths: number; dayOfMonth: number }
  | { kind: 'semi_monthly'; stepMonths: number };

export const SEMI_MONTHLY_DAYS = [1, 15] as const;

export function isRecurrenceFrequency(value: unknown): value is RecurrenceFrequency {
  return typeof value === 'string' && (RECURRENCE_FREQUENCIES as readonly string[]).includes(value);
}
