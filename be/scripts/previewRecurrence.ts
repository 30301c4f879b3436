import {
  FREQUENCY_DISPLAY_LABELS,
  generateOccurrences,
  parseFrequencyLabel,
  RecurrenceEndCondition,
  RecurrenceRule,
} from '../src/recurrence/index.js';

const USAGE =
  'Usage: npm run preview -- <frequency> <anchor> <from> <to> [interval] [until:YYYY-MM-DD|count:N]';

function parseEndCondition(raw: string | undefined): RecurrenceEndCondition {
  if (!raw) {
    return { type: 'never' };
  }
  const [type, value] = raw.split(':');
  if (type === 'until' && value) {
    return { type: 'until', date: value };
  }
  if (type === 'count' && value) {
    return { type: 'count', count: Number(value) };
  }
  throw new Error(`Unrecognized end condition: ${raw}`);
}

function main() {
  const [label, anchor, from, to, interval, end] = process.argv.slice(2);
  if (!label || !anchor || !from || !to) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const frequency = parseFrequencyLabel(label);
  const rule = RecurrenceRule.create(frequency, anchor, interval ? Number(interval) : 1, parseEndCondition(end));

  console.log(`${FREQUENCY_DISPLAY_LABELS[frequency]} from ${rule.anchorDate}, every ${rule.interval}`);
  for (const date of generateOccurrences(rule, from, to)) {
    console.log(date);
  }
}

try {
  main();
} catch (error) {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}
