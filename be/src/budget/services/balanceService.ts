import BudgetBalanceSnapshot from '../models/BudgetBalanceSnapshot.js';
import HttpError from '../../errors/HttpError.js';
import { isIsoDate } from '../../recurrence/index.js';
import { recordBudgetAuditLog } from './auditLogService.js';
import { requireAccount } from './transactionService.js';

export async function setBalance(
  accountId: number,
  amountMinor: number,
  recordedOn: string,
): Promise<BudgetBalanceSnapshot> {
  if (!Number.isInteger(amountMinor)) {
    throw HttpError.badRequest('amountMinor must be an integer');
  }
  if (!isIsoDate(recordedOn)) {
    throw HttpError.badRequest('recordedOn must be a YYYY-MM-DD date');
  }
  await requireAccount(accountId);

  const snapshot = await BudgetBalanceSnapshot.create({ accountId, amountMinor, recordedOn });
  await recordBudgetAuditLog({
    entity: 'budget_balance_snapshot',
    entityId: snapshot.id,
    action: 'create',
    changes: { accountId, amountMinor, recordedOn },
  });
  return snapshot;
}

export async function latestBalance(accountId: number): Promise<BudgetBalanceSnapshot | null> {
  return BudgetBalanceSnapshot.findOne({
    where: { accountId },
    order: [
      ['recordedOn', 'DESC'],
      ['id', 'DESC'],
    ],
  });
}
