import crypto from 'crypto';
import { Op, Transaction as SequelizeTransaction, WhereOptions } from 'sequelize';
import sequelize from '../../config/database.js';
import BudgetAccount from '../models/BudgetAccount.js';
import BudgetTransaction, {
  BudgetTransactionKind,
  BudgetTransactionStatus,
} from '../models/BudgetTransaction.js';
import HttpError from '../../errors/HttpError.js';
import { isIsoDate } from '../../recurrence/index.js';
import { recordBudgetAuditLog } from './auditLogService.js';

export type BudgetTransactionInput = {
  kind: BudgetTransactionKind;
  description: string;
  amountMinor: number;
  date: string;
  accountId?: number;
  category?: string | null;
  status?: BudgetTransactionStatus;
  recurringRuleId?: number | null;
  transferGroupId?: string | null;
  counterpartyAccountId?: number | null;
  meta?: Record<string, unknown> | null;
};

export type BudgetTransactionChanges = Partial<
  Omit<BudgetTransactionInput, 'recurringRuleId' | 'transferGroupId' | 'counterpartyAccountId'>
>;

export type BudgetTransferInput = {
  fromAccountId: number;
  toAccountId: number;
  amountMinor: number;
  date: string;
  description?: string | null;
  status?: BudgetTransactionStatus;
};

export type BudgetTransfer = {
  transferGroupId: string;
  outgoing: BudgetTransaction;
  incoming: BudgetTransaction;
};

export type BudgetTransactionFilters = {
  accountId?: number;
  kind?: BudgetTransactionKind;
  recurringRuleId?: number;
  transferGroupId?: string;
  dateFrom?: string;
  dateTo?: string;
  limit?: number;
  offset?: number;
};

type WriteOptions = { transaction?: SequelizeTransaction };

export const DEFAULT_ACCOUNT_ID = 1;

export function signedAmount(record: { kind: BudgetTransactionKind; amountMinor: number }): number {
  return record.kind === 'expense' ? -record.amountMinor : record.amountMinor;
}

export function assertAmountMinor(value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw HttpError.badRequest('amountMinor must be a positive integer');
  }
  return value;
}

export function assertDescription(value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw HttpError.badRequest('description is required');
  }
  return trimmed;
}

function assertDate(value: string, field: string): string {
  if (!isIsoDate(value)) {
    throw HttpError.badRequest(`${field} must be a YYYY-MM-DD date`);
  }
  return value;
}

export async function requireAccount(accountId: number, options?: WriteOptions): Promise<BudgetAccount> {
  const account = await BudgetAccount.findByPk(accountId, { transaction: options?.transaction });
  if (!account) {
    throw HttpError.notFound('Account', accountId);
  }
  return account;
}

export async function createBudgetTransaction(
  data: BudgetTransactionInput,
  options?: WriteOptions,
): Promise<BudgetTransaction> {
  const accountId = data.accountId ?? DEFAULT_ACCOUNT_ID;
  await requireAccount(accountId, options);

  const record = await BudgetTransaction.create(
    {
      kind: data.kind,
      description: assertDescription(data.description),
      amountMinor: assertAmountMinor(data.amountMinor),
      date: assertDate(data.date, 'date'),
      accountId,
      category: data.category ?? null,
      status: data.status ?? 'posted',
      recurringRuleId: data.recurringRuleId ?? null,
      transferGroupId: data.transferGroupId ?? null,
      counterpartyAccountId: data.counterpartyAccountId ?? null,
      meta: data.meta ? { ...data.meta } : null,
    },
    { transaction: options?.transaction },
  );

  await recordBudgetAuditLog(
    {
      entity: 'budget_transaction',
      entityId: record.id,
      action: 'create',
      changes: record.toJSON(),
    },
    options,
  );

  return record;
}

export async function updateBudgetTransaction(
  id: number,
  changes: BudgetTransactionChanges,
): Promise<BudgetTransaction> {
  const record = await BudgetTransaction.findByPk(id);
  if (!record) {
    throw HttpError.notFound('Transaction', id);
  }

  if (changes.accountId !== undefined) {
    await requireAccount(changes.accountId);
  }

  const payload: Partial<BudgetTransactionInput> = {
    ...(changes.kind !== undefined ? { kind: changes.kind } : {}),
    ...(changes.description !== undefined ? { description: assertDescription(changes.description) } : {}),
    ...(changes.amountMinor !== undefined ? { amountMinor: assertAmountMinor(changes.amountMinor) } : {}),
    ...(changes.date !== undefined ? { date: assertDate(changes.date, 'date') } : {}),
    ...(changes.accountId !== undefined ? { accountId: changes.accountId } : {}),
    ...('category' in changes ? { category: changes.category ?? null } : {}),
    ...(changes.status !== undefined ? { status: changes.status } : {}),
    ...('meta' in changes ? { meta: changes.meta ? { ...changes.meta } : null } : {}),
  };

  await record.update(payload);

  await recordBudgetAuditLog({
    entity: 'budget_transaction',
    entityId: record.id,
    action: 'update',
    changes: payload,
  });

  return record;
}

export async function listBudgetTransactions(
  filters: BudgetTransactionFilters = {},
): Promise<{ rows: BudgetTransaction[]; count: number }> {
  const where: WhereOptions = {};
  if (filters.accountId !== undefined) {
    where.accountId = filters.accountId;
  }
  if (filters.kind) {
    where.kind = filters.kind;
  }
  if (filters.recurringRuleId !== undefined) {
    where.recurringRuleId = filters.recurringRuleId;
  }
  if (filters.transferGroupId) {
    where.transferGroupId = filters.transferGroupId;
  }
  if (filters.dateFrom || filters.dateTo) {
    where.date = {
      ...(filters.dateFrom ? { [Op.gte]: filters.dateFrom } : {}),
      ...(filters.dateTo ? { [Op.lte]: filters.dateTo } : {}),
    };
  }

  return BudgetTransaction.findAndCountAll({
    where,
    limit: filters.limit ?? 50,
    offset: filters.offset ?? 0,
    order: [
      ['date', 'DESC'],
      ['id', 'DESC'],
    ],
  });
}

/** Deleting either side of a transfer removes both, so transfers always net to zero. */
export async function deleteBudgetTransaction(id: number): Promise<void> {
  await sequelize.transaction(async (transaction) => {
    const record = await BudgetTransaction.findByPk(id, { transaction });
    if (!record) {
      throw HttpError.notFound('Transaction', id);
    }
    const where: WhereOptions = record.transferGroupId ? { transferGroupId: record.transferGroupId } : { id };
    const removed = await BudgetTransaction.destroy({ where, transaction });
    await recordBudgetAuditLog(
      {
        entity: 'budget_transaction',
        entityId: id,
        action: 'delete',
        metadata: record.transferGroupId ? { transferGroupId: record.transferGroupId, removed } : null,
      },
      { transaction },
    );
  });
}

/**
 * Moves money between two accounts as an expense on the source and an income
 * on the destination, written together and linked by a transfer group id.
 */
export async function createTransfer(data: BudgetTransferInput): Promise<BudgetTransfer> {
  if (data.fromAccountId === data.toAccountId) {
    throw HttpError.badRequest('Transfer accounts must be different');
  }
  const amountMinor = assertAmountMinor(data.amountMinor);
  const date = assertDate(data.date, 'date');
  const transferGroupId = crypto.randomUUID();

  return sequelize.transaction(async (transaction) => {
    const from = await requireAccount(data.fromAccountId, { transaction });
    const to = await requireAccount(data.toAccountId, { transaction });

    const outgoing = await createBudgetTransaction(
      {
        kind: 'expense',
        description: data.description ?? `Transfer to ${to.name}`,
        amountMinor,
        date,
        accountId: from.id,
        category: 'transfer',
        status: data.status,
        transferGroupId,
        counterpartyAccountId: to.id,
      },
      { transaction },
    );
    const incoming = await createBudgetTransaction(
      {
        kind: 'income',
        description: data.description ?? `Transfer from ${from.name}`,
        amountMinor,
        date,
        accountId: to.id,
        category: 'transfer',
        status: data.status,
        transferGroupId,
        counterpartyAccountId: from.id,
      },
      { transaction },
    );

    return { transferGroupId, outgoing, incoming };
  });
}
