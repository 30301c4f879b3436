import { InvalidRuleError } from './errors.js';
import type { RecurrenceFrequency } from './types.js';

const LABELS = new Map<string, RecurrenceFrequency>([
  ['daily', 'daily'],
  ['weekly', 'weekly'],
  ['biweekly', 'biweekly'],
  ['fortnightly', 'biweekly'],
  ['monthly', 'monthly'],
  ['semimonthly', 'semi_monthly'],
  ['twicemonthly', 'semi_monthly'],
  ['quarterly', 'quarterly'],
  ['semiannually', 'semi_annually'],
  ['semiannual', 'semi_annually'],
  ['annually', 'yearly'],
  ['annual', 'yearly'],
  ['yearly', 'yearly'],
]);

export const FREQUENCY_DISPLAY_LABELS: Record<RecurrenceFrequency, string> = {
  daily: 'Daily',
  weekly: 'Weekly',
  biweekly: 'Biweekly',
  monthly: 'Monthly',
  semi_monthly: 'Semi monthly',
  quarterly: 'Quarterly',
  semi_annually: 'Semi annually',
  yearly: 'Annually',
};

/**
 * Maps what a person types ("Semi Monthly", "semi-annually", "ANNUALLY") to a
 * frequency. Case, spaces, hyphens and underscores are ignored.
 */
export function parseFrequencyLabel(label: string): RecurrenceFrequency {
  const key = label.trim().toLowerCase().replace(/[\s_-]+/g, '');
  const frequency = LABELS.get(key);
  if (!frequency) {
    throw new InvalidRuleError('frequency', `Unknown frequency: ${label}`);
  }
  return frequency;
}
