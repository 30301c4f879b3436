import { createAccount } from '../accountService';
import {
  addIrregularRule,
  createIrregularCategory,
  forecastFromState,
  forecastIrregular,
  getIrregularCategory,
  learnIrregularState,
  matchCategoryId,
  rulesFor,
  summarizeIrregularEvents,
} from '../irregularService';
import { createBudgetTransaction, createTransfer } from '../transactionService';
import { closeDatabase, resetDatabase } from './databaseSupport';

const COFFEE_EVENTS = [
  { date: '2024-01-01', amountMinor: 5000 },
  { date: '2024-01-04', amountMinor: 5100 },
  { date: '2024-01-11', amountMinor: 5200 },
  { date: '2024-01-14', amountMinor: 5300 },
];

describe('summarizeIrregularEvents', () => {
  it('smooths gaps, weekdays and amounts', () => {
    expect(summarizeIrregularEvents(COFFEE_EVENTS, 0.5)).toEqual({
      avgGapDays: 4,
      weekdayProbs: [2, 2, 1, 1, 3, 1, 1].map((count) => count / 11),
      medianAmountMinor: 5150,
      lastEventOn: '2024-01-14',
    });
  });

  it('leaves the gap unknown for a single event', () => {
    const summary = summarizeIrregularEvents([{ date: '2024-03-02', amountMinor: 800 }], 0.3);

    expect(summary.avgGapDays).toBeNull();
    expect(summary.medianAmountMinor).toBe(800);
    expect(summary.lastEventOn).toBe('2024-03-02');
  });

  it('learns nothing from no events', () => {
    expect(summarizeIrregularEvents([], 0.3)).toEqual({
      avgGapDays: null,
      weekdayProbs: null,
      medianAmountMinor: null,
      lastEventOn: null,
    });
  });
});

describe('forecastFromState', () => {
  const uniform = [1, 1, 1, 1, 1, 1, 1].map((count) => count / 7);
  const saturdays = [0.1, 0.1, 0.1, 0.1, 0.1, 0.1, 0.4];

  it('repeats the median every rounded gap after the last event', () => {
    const state = { avgGapDays: 7, weekdayProbs: uniform, medianAmountMinor: 4000, lastEventOn: '2024-01-01' };

    expect(forecastFromState(state, '2024-01-02', '2024-01-31')).toEqual([
      { date: '2024-01-08', amountMinor: 4000 },
      { date: '2024-01-15', amountMinor: 4000 },
      { date: '2024-01-22', amountMinor: 4000 },
      { date: '2024-01-29', amountMinor: 4000 },
    ]);
  });

  it('moves weekly or slower events to the likeliest nearby weekday', () => {
    const state = { avgGapDays: 10, weekdayProbs: saturdays, medianAmountMinor: 2500, lastEventOn: '2024-01-06' };

    expect(forecastFromState(state, '2024-01-07', '2024-01-31').map((point) => point.date)).toEqual([
      '2024-01-13',
      '2024-01-27',
    ]);
  });

  it('keeps nominal dates for gaps under a week', () => {
    const state = { avgGapDays: 4.4, weekdayProbs: saturdays, medianAmountMinor: 900, lastEventOn: '2024-01-14' };

    expect(forecastFromState(state, '2024-01-15', '2024-01-25').map((point) => point.date)).toEqual([
      '2024-01-18',
      '2024-01-22',
    ]);
    expect(forecastFromState(state, '2024-01-20', '2024-01-25').map((point) => point.date)).toEqual(['2024-01-22']);
  });

  it('projects nothing before anything was learned', () => {
    const state = { avgGapDays: null, weekdayProbs: null, medianAmountMinor: null, lastEventOn: null };
    expect(forecastFromState(state, null, '2024-12-31')).toEqual([]);
  });
});

describe('irregularService', () => {
  beforeEach(async () => {
    await resetDatabase();
  });

  afterAll(async () => {
    await closeDatabase();
  });

  it('creates a category with normalized patterns and an empty state', async () => {
    const category = await createIrregularCategory({ name: 'Coffee', patterns: ['Cafe', ' BEAN ', 'cafe'] });
    const loaded = await getIrregularCategory(category.id);

    expect(await rulesFor(category.id)).toEqual(['cafe', 'bean']);
    expect(loaded.windowDays).toBe(120);
    expect(loaded.alpha).toBe(0.3);
    expect(loaded.state?.avgGapDays).toBeNull();
  });

  it('refuses duplicate names and patterns', async () => {
    const category = await createIrregularCategory({ name: 'Coffee', patterns: ['cafe'] });

    await expect(createIrregularCategory({ name: 'Coffee' })).rejects.toMatchObject({ status: 409 });
    await expect(addIrregularRule(category.id, 'CAFE')).rejects.toMatchObject({ status: 409 });
    await expect(addIrregularRule(category.id, '   ')).rejects.toMatchObject({
      status: 400,
      message: 'pattern is required',
    });
    await expect(addIrregularRule(999, 'tea')).rejects.toMatchObject({ status: 404 });
  });

  it('matches descriptions to the oldest rule, ignoring case', async () => {
    const coffee = await createIrregularCategory({ name: 'Coffee', patterns: ['cafe'] });
    await createIrregularCategory({ name: 'Snacks', patterns: ['run'] });

    expect(await matchCategoryId('Morning CAFE run')).toBe(coffee.id);
    expect(await matchCategoryId('Rent')).toBeNull();
  });

  it('learns from matching expenses inside the window only', async () => {
    const category = await createIrregularCategory({
      name: 'Coffee',
      patterns: ['cafe', 'bean'],
      alpha: 0.5,
      windowDays: 30,
    });
    const savings = await createAccount({ name: 'Savings', type: 'savings' });

    const expenses: Array<[string, string, number]> = [
      ['Cafe before the window', '2023-12-01', 9000],
      ['Corner Cafe', '2024-01-01', 5000],
      ['Bean Bar', '2024-01-04', 5100],
      ['Groceries', '2024-01-05', 9999],
      ['cafe latte', '2024-01-11', 5200],
      ['CAFE', '2024-01-14', 5300],
    ];
    for (const [description, date, amountMinor] of expenses) {
      await createBudgetTransaction({ kind: 'expense', description, amountMinor, date });
    }
    await createBudgetTransaction({ kind: 'income', description: 'Cafe refund', amountMinor: 700, date: '2024-01-06' });
    await createTransfer({
      fromAccountId: 1,
      toAccountId: savings.id,
      amountMinor: 4000,
      date: '2024-01-07',
      description: 'Cafe float',
    });

    const state = await learnIrregularState(category.id, { end: '2024-01-20' });

    expect(state.avgGapDays).toBe(4);
    expect(state.medianAmountMinor).toBe(5150);
    expect(state.lastEventOn).toBe('2024-01-14');
    expect(state.weekdayProbs).toEqual([2, 2, 1, 1, 3, 1, 1].map((count) => count / 11));

    expect(await forecastIrregular(category.id, '2024-01-15', '2024-01-31')).toEqual([
      { date: '2024-01-18', amountMinor: 5150 },
      { date: '2024-01-22', amountMinor: 5150 },
      { date: '2024-01-26', amountMinor: 5150 },
      { date: '2024-01-30', amountMinor: 5150 },
    ]);
  });

  it('clears the state when the window has no events', async () => {
    const category = await createIrregularCategory({ name: 'Coffee', patterns: ['cafe'] });
    await createBudgetTransaction({ kind: 'expense', description: 'Cafe', amountMinor: 400, date: '2024-01-02' });
    await learnIrregularState(category.id, { end: '2024-01-31' });

    const state = await learnIrregularState(category.id, { start: '2024-02-01', end: '2024-02-29' });

    expect(state.medianAmountMinor).toBeNull();
    expect(state.lastEventOn).toBeNull();
    expect(await forecastIrregular(category.id, '2024-03-01', '2024-03-31')).toEqual([]);
  });

  it('rejects an inverted learning window', async () => {
    const category = await createIrregularCategory({ name: 'Coffee' });

    await expect(learnIrregularState(category.id, { start: '2024-02-01', end: '2024-01-01' })).rejects.toMatchObject({
      status: 400,
      message: 'start 2024-02-01 is after end 2024-01-01',
    });
  });
});
