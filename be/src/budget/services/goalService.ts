import BudgetGoal from '../models/BudgetGoal.js';
import HttpError from '../../errors/HttpError.js';
import { isIsoDate } from '../../recurrence/index.js';
import { recordBudgetAuditLog } from './auditLogService.js';
import { assertAmountMinor, assertDescription, DEFAULT_ACCOUNT_ID, requireAccount } from './transactionService.js';

export type BudgetGoalInput = {
  description: string;
  amountMinor: number;
  targetDate: string;
  enabled?: boolean;
  accountId?: number;
};

export async function createGoal(input: BudgetGoalInput): Promise<BudgetGoal> {
  if (!isIsoDate(input.targetDate)) {
    throw HttpError.badRequest('targetDate must be a YYYY-MM-DD date');
  }
  const accountId = input.accountId ?? DEFAULT_ACCOUNT_ID;
  await requireAccount(accountId);

  const goal = await BudgetGoal.create({
    description: assertDescription(input.description),
    amountMinor: assertAmountMinor(input.amountMinor),
    targetDate: input.targetDate,
    enabled: input.enabled ?? true,
    accountId,
  });
  await recordBudgetAuditLog({ entity: 'budget_goal', entityId: goal.id, action: 'create', changes: goal.toJSON() });
  return goal;
}

export async function toggleGoal(id: number): Promise<BudgetGoal> {
  const goal = await BudgetGoal.findByPk(id);
  if (!goal) {
    throw HttpError.notFound('Goal', id);
  }
  await goal.update({ enabled: !goal.enabled });
  await recordBudgetAuditLog({
    entity: 'budget_goal',
    entityId: goal.id,
    action: 'toggle',
    changes: { enabled: goal.enabled },
  });
  return goal;
}

export async function listGoals(accountId: number = DEFAULT_ACCOUNT_ID): Promise<BudgetGoal[]> {
  return BudgetGoal.findAll({
    where: { accountId },
    order: [
      ['targetDate', 'ASC'],
      ['id', 'ASC'],
    ],
  });
}
