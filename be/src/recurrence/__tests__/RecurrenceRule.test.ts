import { RecurrenceRule } from '../RecurrenceRule';
import { InvalidRuleError } from '../errors';

describe('RecurrenceRule.create', () => {
  it('defaults to an interval of 1 and no end', () => {
    const rule = RecurrenceRule.create('monthly', '2023-01-31');

    expect(rule.frequency).toBe('monthly');
    expect(rule.anchorDate).toBe('2023-01-31');
    expect(rule.interval).toBe(1);
    expect(rule.endCondition).toEqual({ type: 'never' });
    expect(rule.cadence).toEqual({ kind: 'months', stepMonths: 1, dayOfMonth: 31 });
  });

  it('derives a cadence per frequency', () => {
    expect(RecurrenceRule.create('weekly', '2023-01-02', 2).cadence).toEqual({ kind: 'days', stepDays: 14 });
    expect(RecurrenceRule.create('biweekly', '2023-01-02').cadence).toEqual({ kind: 'days', stepDays: 14 });
    expect(RecurrenceRule.create('quarterly', '2023-05-20').cadence).toEqual({
      kind: 'months',
      stepMonths: 3,
      dayOfMonth: 20,
    });
    expect(RecurrenceRule.create('yearly', '2024-02-29', 2).cadence).toEqual({
      kind: 'months',
      stepMonths: 24,
      dayOfMonth: 29,
    });
    expect(RecurrenceRule.create('semi_monthly', '2023-03-20').cadence).toEqual({
      kind: 'semi_monthly',
      stepMonths: 1,
    });
  });

  it('is frozen once created', () => {
    const rule = RecurrenceRule.create('daily', '2023-01-01', 1, { type: 'count', count: 3 });

    expect(Object.isFrozen(rule)).toBe(true);
    expect(Object.isFrozen(rule.endCondition)).toBe(true);
  });

  it('accepts an until date equal to the anchor', () => {
    const rule = RecurrenceRule.create('weekly', '2023-01-01', 1, { type: 'until', date: '2023-01-01' });
    expect(rule.endCondition).toEqual({ type: 'until', date: '2023-01-01' });
  });

  it('rejects an interval of zero', () => {
    expect(() => RecurrenceRule.create('daily', '2023-01-01', 0)).toThrow(InvalidRuleError);
  });

  it('rejects a fractional interval', () => {
    expect(() => RecurrenceRule.create('daily', '2023-01-01', 1.5)).toThrow('Interval must be a positive integer');
  });

  it('rejects an until date earlier than the anchor', () => {
    let caught: unknown;
    try {
      RecurrenceRule.create('monthly', '2023-05-01', 1, { type: 'until', date: '2023-04-30' });
    } catch (error) {
      caught = error;
    }

    if (!(caught instanceof InvalidRuleError)) {
      throw new Error('expected an InvalidRuleError');
    }
    expect(caught.field).toBe('endCondition');
    expect(caught.message).toBe('Until date 2023-04-30 is earlier than anchor date 2023-05-01');
  });

  it('rejects a count below one', () => {
    expect(() => RecurrenceRule.create('weekly', '2023-01-01', 1, { type: 'count', count: 0 })).toThrow(
      InvalidRuleError,
    );
  });

  it('rejects dates that do not exist', () => {
    expect(() => RecurrenceRule.create('monthly', '2023-02-29')).toThrow('Invalid anchor date: 2023-02-29');
    expect(() => RecurrenceRule.create('monthly', '2023-13-01')).toThrow(InvalidRuleError);
    expect(() => RecurrenceRule.create('monthly', '01/02/2023')).toThrow(InvalidRuleError);
  });

  it('rejects years below 100 instead of moving them to the 1900s', () => {
    expect(() => RecurrenceRule.create('monthly', '0050-01-31')).toThrow('Invalid anchor date: 0050-01-31');
    expect(() => RecurrenceRule.create('monthly', '2023-01-01', 1, { type: 'until', date: '0099-12-31' })).toThrow(
      InvalidRuleError,
    );
  });

  it('keeps early four-digit anchors exactly', () => {
    const rule = RecurrenceRule.create('monthly', '1200-01-31');

    expect(rule.anchorDate).toBe('1200-01-31');
    expect(rule.anchorDay.year()).toBe(1200);
    expect(rule.anchorDay.date()).toBe(31);
  });

  it('rejects unknown frequencies', () => {
    expect(() => RecurrenceRule.create('hourly', '2023-01-01')).toThrow('Unsupported frequency: hourly');
  });
});
