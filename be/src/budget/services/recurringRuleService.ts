import { Op, Transaction as SequelizeTransaction, WhereOptions } from 'sequelize';
import sequelize from '../../config/database.js';
import BudgetRecurringRule, { BudgetRecurringStatus } from '../models/BudgetRecurringRule.js';
import BudgetTransaction, { BudgetTransactionKind } from '../models/BudgetTransaction.js';
import HttpError from '../../errors/HttpError.js';
import logger from '../../utils/logger.js';
import {
  addIsoDays,
  InvalidRuleError,
  isIsoDate,
  isRecurrenceFrequency,
  listOccurrences,
  parseFrequencyLabel,
  RecurrenceEndCondition,
  RecurrenceEndType,
  RecurrenceFrequency,
  RecurrenceRule,
  seriesStart,
  IsoDate,
} from '../../recurrence/index.js';
import { recordBudgetAuditLog } from './auditLogService.js';
import {
  assertAmountMinor,
  assertDescription,
  createBudgetTransaction,
  DEFAULT_ACCOUNT_ID,
  requireAccount,
} from './transactionService.js';

export type RecurringRuleInput = {
  kind: BudgetTransactionKind;
  description: string;
  amountMinor: number;
  category?: string | null;
  accountId?: number;
  /** A frequency key (`semi_monthly`) or a label such as "Semi monthly". */
  frequency: string;
  interval?: number;
  startDate: IsoDate;
  endCondition?: RecurrenceEndCondition;
};

export type MaterializeResult = {
  processed: number;
  createdTransactions: number;
  skipped: number;
};

type StoredEndCondition = {
  endType: RecurrenceEndType;
  endDate: string | null;
  occurrenceCount: number | null;
};

function resolveFrequency(value: string): RecurrenceFrequency {
  return isRecurrenceFrequency(value) ? value : parseFrequencyLabel(value);
}

function toStoredEndCondition(endCondition: RecurrenceEndCondition): StoredEndCondition {
  switch (endCondition.type) {
    case 'never':
      return { endType: 'never', endDate: null, occurrenceCount: null };
    case 'until':
      return { endType: 'until', endDate: endCondition.date, occurrenceCount: null };
    case 'count':
      return { endType: 'count', endDate: null, occurrenceCount: endCondition.count };
  }
}

function endConditionOf(record: BudgetRecurringRule): RecurrenceEndCondition {
  switch (record.endType) {
    case 'never':
      return { type: 'never' };
    case 'until':
      if (!record.endDate) {
        throw new InvalidRuleError('endCondition', `Recurring rule ${record.id} has no end date`);
      }
      return { type: 'until', date: record.endDate };
    case 'count':
      if (record.occurrenceCount == null) {
        throw new InvalidRuleError('endCondition', `Recurring rule ${record.id} has no occurrence count`);
      }
      return { type: 'count', count: record.occurrenceCount };
  }
}

export function toRecurrenceRule(record: BudgetRecurringRule): RecurrenceRule {
  return RecurrenceRule.create(record.frequency, record.startDate, record.interval, endConditionOf(record));
}

export async function createRecurringRule(
  input: RecurringRuleInput,
  options?: { transaction?: SequelizeTransaction },
): Promise<BudgetRecurringRule> {
  const rule = RecurrenceRule.create(
    resolveFrequency(input.frequency),
    input.startDate,
    input.interval ?? 1,
    input.endCondition ?? { type: 'never' },
  );
  const accountId = input.accountId ?? DEFAULT_ACCOUNT_ID;
  await requireAccount(accountId, options);

  const record = await BudgetRecurringRule.create(
    {
      kind: input.kind,
      description: assertDescription(input.description),
      amountMinor: assertAmountMinor(input.amountMinor),
      category: input.category ?? null,
      accountId,
      frequency: rule.frequency,
      interval: rule.interval,
      startDate: rule.anchorDate,
      ...toStoredEndCondition(rule.endCondition),
      status: 'active',
    },
    { transaction: options?.transaction },
  );

  await recordBudgetAuditLog(
    {
      entity: 'budget_recurring_rule',
      entityId: record.id,
      action: 'create',
      changes: record.toJSON(),
    },
    options,
  );

  return record;
}

export async function getRecurringRule(id: number): Promise<BudgetRecurringRule> {
  const record = await BudgetRecurringRule.findByPk(id);
  if (!record) {
    throw HttpError.notFound('Recurring rule', id);
  }
  return record;
}

export async function listRecurringRules(
  filters: { status?: BudgetRecurringStatus; accountId?: number } = {},
): Promise<BudgetRecurringRule[]> {
  const where: WhereOptions = {};
  if (filters.status) {
    where.status = filters.status;
  }
  if (filters.accountId !== undefined) {
    where.accountId = filters.accountId;
  }
  return BudgetRecurringRule.findAll({ where, order: [['id', 'ASC']] });
}

export async function previewOccurrences(id: number, windowStart: IsoDate, windowEnd: IsoDate): Promise<IsoDate[]> {
  const record = await getRecurringRule(id);
  return listOccurrences(toRecurrenceRule(record), windowStart, windowEnd);
}

export type ReplaceResult = {
  retired: BudgetRecurringRule;
  replacement: BudgetRecurringRule;
  removedPlanned: number;
};

/**
 * Rules are immutable: a schedule change creates a successor and retires the
 * current row. Posted transactions of the old rule stay as they are; its
 * planned ones dated on or after the successor's first occurrence are removed.
 */
export async function replaceRecurringRule(id: number, input: RecurringRuleInput): Promise<ReplaceResult> {
  return sequelize.transaction(async (transaction) => {
    const current = await BudgetRecurringRule.findByPk(id, { transaction });
    if (!current) {
      throw HttpError.notFound('Recurring rule', id);
    }
    if (current.status === 'retired') {
      throw HttpError.conflict(`Recurring rule ${id} was already replaced`, { replacedById: current.replacedById });
    }

    const replacement = await createRecurringRule(input, { transaction });
    await current.update({ status: 'retired', replacedById: replacement.id }, { transaction });

    const removedPlanned = await BudgetTransaction.destroy({
      where: {
        recurringRuleId: current.id,
        status: 'planned',
        date: { [Op.gte]: seriesStart(toRecurrenceRule(replacement)) },
      },
      transaction,
    });

    await recordBudgetAuditLog(
      {
        entity: 'budget_recurring_rule',
        entityId: current.id,
        action: 'replace',
        metadata: { replacedById: replacement.id, removedPlanned },
      },
      { transaction },
    );

    return { retired: current, replacement, removedPlanned };
  });
}

export async function deleteRecurringRule(id: number): Promise<void> {
  const count = await BudgetRecurringRule.destroy({ where: { id } });
  if (!count) {
    throw HttpError.notFound('Recurring rule', id);
  }
  await recordBudgetAuditLog({ entity: 'budget_recurring_rule', entityId: id, action: 'delete' });
}

/** First date a rule still has to record, or null when everything up to `through` is done. */
export function pendingWindowStart(record: BudgetRecurringRule, rule: RecurrenceRule, through: IsoDate): IsoDate | null {
  const start = record.materializedThrough ? addIsoDays(record.materializedThrough, 1) : seriesStart(rule);
  return start > through ? null : start;
}

/**
 * Records a planned transaction for every occurrence of every active rule up
 * to `through`. An occurrence that already has a transaction for the same rule
 * is counted as skipped, so running this twice creates nothing new.
 */
export async function materializeRecurringRules({
  through,
  accountId,
}: {
  through: IsoDate;
  accountId?: number;
}): Promise<MaterializeResult> {
  if (!isIsoDate(through)) {
    throw HttpError.badRequest('through must be a YYYY-MM-DD date');
  }

  const rules = await listRecurringRules({ status: 'active', accountId });

  let processed = 0;
  let createdTransactions = 0;
  let skipped = 0;

  for (const record of rules) {
    processed += 1;
    const rule = toRecurrenceRule(record);
    const windowStart = pendingWindowStart(record, rule, through);
    if (!windowStart) {
      continue;
    }

    const dates = listOccurrences(rule, windowStart, through);

    const created = await sequelize.transaction(async (transaction) => {
      const existing: BudgetTransaction[] =
        dates.length > 0
          ? await BudgetTransaction.findAll({
              where: { recurringRuleId: record.id, date: dates },
              attributes: ['date'],
              transaction,
            })
          : [];
      const recordedDates = new Set(existing.map((row) => row.date));

      let count = 0;
      for (const date of dates) {
        if (recordedDates.has(date)) {
          continue;
        }
        await createBudgetTransaction(
          {
            kind: record.kind,
            description: record.description,
            amountMinor: record.amountMinor,
            date,
            accountId: record.accountId,
            category: record.category,
            status: 'planned',
            recurringRuleId: record.id,
            meta: { recurring_scheduled_for: date },
          },
          { transaction },
        );
        count += 1;
      }

      await record.update({ materializedThrough: through }, { transaction });
      return count;
    });

    createdTransactions += created;
    skipped += dates.length - created;
    logger.debug(`Recurring rule ${record.id}: recorded ${created} of ${dates.length} occurrences through ${through}`);
  }

  return { processed, createdTransactions, skipped };
}
