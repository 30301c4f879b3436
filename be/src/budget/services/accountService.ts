import BudgetAccount, { BudgetAccountType } from '../models/BudgetAccount.js';
import HttpError from '../../errors/HttpError.js';
import logger from '../../utils/logger.js';
import { recordBudgetAuditLog } from './auditLogService.js';
import { DEFAULT_ACCOUNT_ID } from './transactionService.js';

export type BudgetAccountInput = {
  name: string;
  type?: BudgetAccountType;
  institution?: string | null;
  last4?: string | null;
  currency?: string;
};

export async function listAccounts(includeArchived = false): Promise<BudgetAccount[]> {
  return BudgetAccount.findAll({
    where: includeArchived ? {} : { archived: false },
    order: [['id', 'ASC']],
  });
}

export async function createAccount(input: BudgetAccountInput): Promise<BudgetAccount> {
  const name = input.name.trim();
  if (!name) {
    throw HttpError.badRequest('name is required');
  }
  const existing = await BudgetAccount.findOne({ where: { name } });
  if (existing) {
    throw HttpError.conflict(`Account "${name}" already exists`);
  }

  const account = await BudgetAccount.create({
    name,
    type: input.type ?? 'checking',
    institution: input.institution ?? null,
    last4: input.last4 ?? null,
    currency: (input.currency ?? 'USD').toUpperCase(),
  });

  await recordBudgetAuditLog({
    entity: 'budget_account',
    entityId: account.id,
    action: 'create',
    changes: account.toJSON(),
  });

  return account;
}

/** Every record defaults to account 1, so it has to exist before anything is written. */
export async function ensureDefaultAccount(): Promise<BudgetAccount> {
  const existing = await BudgetAccount.findByPk(DEFAULT_ACCOUNT_ID);
  if (existing) {
    return existing;
  }
  logger.info('Creating default budget account');
  return BudgetAccount.create({ id: DEFAULT_ACCOUNT_ID, name: 'Main', type: 'checking', currency: 'USD' });
}
