export { RecurrenceRule } from './RecurrenceRule.js';
export { RecurrenceEngine, generateOccurrences, listOccurrences, seriesStart } from './RecurrenceEngine.js';
export { InvalidRuleError, InvalidWindowError } from './errors.js';
export { parseFrequencyLabel, FREQUENCY_DISPLAY_LABELS } from './frequencyLabels.js';
export { addIsoDays, daysBetween, formatIsoDate, isIsoDate, parseIsoDate } from './calendar.js';
export * from './types.js';
