import { createAccount, ensureDefaultAccount, listAccounts } from '../accountService';
import { latestBalance, setBalance } from '../balanceService';
import { createGoal, listGoals, toggleGoal } from '../goalService';
import { closeDatabase, resetDatabase } from './databaseSupport';

describe('account, balance and goal services', () => {
  beforeEach(async () => {
    await resetDatabase();
  });

  afterAll(async () => {
    await closeDatabase();
  });

  describe('accounts', () => {
    it('keeps a single default account', async () => {
      const again = await ensureDefaultAccount();

      expect(again.id).toBe(1);
      expect((await listAccounts()).map((account) => account.name)).toEqual(['Main']);
    });

    it('creates accounts with an upper-case currency and rejects duplicates', async () => {
      const savings = await createAccount({ name: ' Savings ', type: 'savings', currency: 'eur' });

      expect(savings.name).toBe('Savings');
      expect(savings.currency).toBe('EUR');
      await expect(createAccount({ name: 'Savings' })).rejects.toMatchObject({ status: 409 });
    });
  });

  describe('balances', () => {
    it('returns the most recent snapshot', async () => {
      await setBalance(1, 5000, '2023-01-10');
      await setBalance(1, 7000, '2023-02-10');
      await setBalance(1, 6000, '2023-01-20');

      const latest = await latestBalance(1);

      expect(latest?.amountMinor).toBe(7000);
      expect(latest?.recordedOn).toBe('2023-02-10');
    });

    it('accepts negative balances but not fractional ones', async () => {
      const overdrawn = await setBalance(1, -2500, '2023-03-01');

      expect(overdrawn.amountMinor).toBe(-2500);
      await expect(setBalance(1, 10.5, '2023-03-01')).rejects.toThrow('amountMinor must be an integer');
    });

    it('has no balance before one is set', async () => {
      expect(await latestBalance(1)).toBeNull();
    });
  });

  describe('goals', () => {
    it('lists goals by target date and toggles them', async () => {
      const car = await createGoal({ description: 'Car', amountMinor: 500000, targetDate: '2024-06-01' });
      await createGoal({ description: 'Trip', amountMinor: 120000, targetDate: '2023-12-01' });

      const toggled = await toggleGoal(car.id);

      expect(toggled.enabled).toBe(false);
      expect((await listGoals()).map((goal) => goal.description)).toEqual(['Trip', 'Car']);
    });

    it('rejects a goal without a valid target date', async () => {
      await expect(
        createGoal({ description: 'Someday', amountMinor: 100, targetDate: '2024-02-30' }),
      ).rejects.toThrow('targetDate must be a YYYY-MM-DD date');
      await expect(toggleGoal(99)).rejects.toMatchObject({ status: 404, message: 'Goal 99 not found' });
    });
  });
});
