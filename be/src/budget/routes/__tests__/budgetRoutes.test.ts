import request from 'supertest';
import app from '../../../app';
import { closeDatabase, resetDatabase } from '../../services/__tests__/databaseSupport';

type ErrorEntry = { path: string; msg: string };

const rent = {
  kind: 'expense',
  description: 'Rent',
  amountMinor: 150000,
  frequency: 'monthly',
  startDate: '2023-01-31',
};

describe('budget routes', () => {
  beforeEach(async () => {
    await resetDatabase();
  });

  afterAll(async () => {
    await closeDatabase();
  });

  it('answers on the root path', async () => {
    const response = await request(app).get('/');
    expect(response.status).toBe(200);
    expect(response.text).toBe('Budget API');
  });

  it('creates a rule from a frequency label and previews it', async () => {
    const created = await request(app)
      .post('/api/budget/recurring-rules')
      .send({ ...rent, frequency: 'Semi monthly', startDate: '2023-03-20' });

    expect(created.status).toBe(201);
    expect(created.body.frequency).toBe('semi_monthly');

    const preview = await request(app)
      .get(`/api/budget/recurring-rules/${created.body.id}/occurrences`)
      .query({ from: '2023-03-01', to: '2023-04-30' });

    expect(preview.status).toBe(200);
    expect(preview.body).toEqual({
      data: ['2023-03-01', '2023-03-15', '2023-04-01', '2023-04-15'],
      meta: { from: '2023-03-01', to: '2023-04-30', count: 4 },
    });
  });

  it('rejects an invalid rule with the field at fault', async () => {
    const response = await request(app)
      .post('/api/budget/recurring-rules')
      .send({ ...rent, interval: 0 });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: { message: 'Interval must be a positive integer', details: { field: 'interval' } },
    });
  });

  it('rejects an inverted preview window', async () => {
    const created = await request(app).post('/api/budget/recurring-rules').send(rent);

    const response = await request(app)
      .get(`/api/budget/recurring-rules/${created.body.id}/occurrences`)
      .query({ from: '2023-02-01', to: '2023-01-01' });

    expect(response.status).toBe(400);
    expect(response.body.error.message).toBe('Window end 2023-01-01 precedes window start 2023-02-01');
  });

  it('validates transaction bodies before they reach the service', async () => {
    const response = await request(app)
      .post('/api/budget/transactions')
      .send({ description: 'Coffee', amountMinor: 450, date: '2023-05-02' });

    expect(response.status).toBe(400);
    const errors: ErrorEntry[] = response.body.errors;
    expect(errors.map((entry) => entry.path)).toEqual(['kind']);
    expect(errors[0].msg).toBe('kind must be income or expense');
  });

  it('reports unknown transactions as not found', async () => {
    const response = await request(app).get('/api/budget/transactions/999');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: { message: 'Transaction 999 not found' } });
  });

  it('materializes rules and shows them in the ledger', async () => {
    await request(app).post('/api/budget/recurring-rules').send(rent);
    await request(app).post('/api/budget/balance').send({ amountMinor: 500000, recordedOn: '2023-01-01' });

    const run = await request(app).post('/api/budget/recurring-runs/materialize').send({ through: '2023-03-31' });

    expect(run.status).toBe(200);
    expect(run.body).toEqual({ processed: 1, createdTransactions: 3, skipped: 0 });

    const ledger = await request(app).get('/api/budget/ledger').query({ through: '2023-04-30' });
    const rows: { date: string; source: string; running: number }[] = ledger.body.data;

    expect(ledger.status).toBe(200);
    expect(rows.map(({ date, source, running }) => ({ date, source, running }))).toEqual([
      { date: '2023-01-01', source: 'balance', running: 500000 },
      { date: '2023-01-31', source: 'recorded', running: 350000 },
      { date: '2023-02-28', source: 'recorded', running: 200000 },
      { date: '2023-03-31', source: 'recorded', running: 50000 },
      { date: '2023-04-30', source: 'projected', running: -100000 },
    ]);
  });

  it('refuses to replace a rule twice', async () => {
    const created = await request(app).post('/api/budget/recurring-rules').send(rent);
    const replacement = { ...rent, amountMinor: 155000, startDate: '2023-06-30' };

    const first = await request(app).post(`/api/budget/recurring-rules/${created.body.id}/replace`).send(replacement);
    const second = await request(app).post(`/api/budget/recurring-rules/${created.body.id}/replace`).send(replacement);

    expect(first.status).toBe(201);
    expect(first.body.retired.status).toBe('retired');
    expect(second.status).toBe(409);
    expect(second.body.error.message).toBe(`Recurring rule ${created.body.id} was already replaced`);
  });

  it('rejects a malformed end condition before it reaches the service', async () => {
    const response = await request(app)
      .post('/api/budget/recurring-rules')
      .send({ ...rent, endCondition: { type: 'count', count: 'three' } });

    expect(response.status).toBe(400);
    const errors: ErrorEntry[] = response.body.errors;
    expect(errors.map((entry) => entry.path)).toEqual(['endCondition']);
  });

  it('stores a count end condition sent as JSON', async () => {
    const created = await request(app)
      .post('/api/budget/recurring-rules')
      .send({ ...rent, endCondition: { type: 'count', count: 2 } });

    expect(created.status).toBe(201);
    expect(created.body.endType).toBe('count');
    expect(created.body.occurrenceCount).toBe(2);
  });

  it('clears a category with an explicit null and keeps other fields', async () => {
    const created = await request(app)
      .post('/api/budget/transactions')
      .send({ kind: 'expense', description: ' Lunch ', amountMinor: '1250', date: '2023-05-02', category: 'food' });

    expect(created.status).toBe(201);
    expect(created.body.description).toBe('Lunch');
    expect(created.body.amountMinor).toBe(1250);

    const updated = await request(app).put(`/api/budget/transactions/${created.body.id}`).send({ category: null });

    expect(updated.status).toBe(200);
    expect(updated.body.category).toBeNull();
    expect(updated.body.description).toBe('Lunch');
  });

  it('validates list filters', async () => {
    const response = await request(app).get('/api/budget/transactions').query({ limit: 0 });

    expect(response.status).toBe(400);
    const errors: ErrorEntry[] = response.body.errors;
    expect(errors.map((entry) => entry.msg)).toEqual(['limit must be between 1 and 500']);
  });

  it('moves money between accounts', async () => {
    const savings = await request(app).post('/api/budget/accounts').send({ name: 'Savings', type: 'savings' });

    const transfer = await request(app)
      .post('/api/budget/transfers')
      .send({ fromAccountId: 1, toAccountId: savings.body.id, amountMinor: 20000, date: '2023-05-01' });

    expect(transfer.status).toBe(201);
    expect(transfer.body.outgoing.transferGroupId).toBe(transfer.body.transferGroupId);

    const listed = await request(app)
      .get('/api/budget/transactions')
      .query({ transferGroupId: transfer.body.transferGroupId });
    const amounts: { kind: string; amountMinor: number; accountId: number }[] = listed.body.data;

    expect(listed.body.meta.count).toBe(2);
    expect(amounts.map(({ kind, accountId }) => ({ kind, accountId })).sort((a, b) => a.accountId - b.accountId)).toEqual([
      { kind: 'expense', accountId: 1 },
      { kind: 'income', accountId: savings.body.id },
    ]);
  });

  it('learns an irregular category and forecasts it', async () => {
    const category = await request(app)
      .post('/api/budget/irregular-categories')
      .send({ name: 'Coffee', patterns: ['cafe'], alpha: '0.5' });
    expect(category.status).toBe(201);

    const rule = await request(app).post(`/api/budget/irregular-categories/${category.body.id}/rules`).send({ pattern: 'Bean' });
    expect(rule.status).toBe(201);
    expect(rule.body.pattern).toBe('bean');

    for (const [description, date] of [
      ['Cafe', '2024-01-01'],
      ['Bean Bar', '2024-01-04'],
    ]) {
      await request(app).post('/api/budget/transactions').send({ kind: 'expense', description, amountMinor: 600, date });
    }

    const learned = await request(app)
      .post(`/api/budget/irregular-categories/${category.body.id}/learn`)
      .send({ end: '2024-01-10' });
    expect(learned.status).toBe(200);
    expect(learned.body.avgGapDays).toBe(3);

    const forecast = await request(app)
      .get(`/api/budget/irregular-categories/${category.body.id}/forecast`)
      .query({ from: '2024-01-05', to: '2024-01-12' });

    expect(forecast.status).toBe(200);
    expect(forecast.body).toEqual({
      data: [
        { date: '2024-01-07', amountMinor: 600 },
        { date: '2024-01-10', amountMinor: 600 },
      ],
      meta: { from: '2024-01-05', to: '2024-01-12', count: 2 },
    });
  });
});
