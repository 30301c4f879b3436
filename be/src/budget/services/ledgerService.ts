import { Op } from 'sequelize';
import BudgetBalanceSnapshot from '../models/BudgetBalanceSnapshot.js';
import BudgetTransaction from '../models/BudgetTransaction.js';
import HttpError from '../../errors/HttpError.js';
import { isIsoDate, listOccurrences, IsoDate } from '../../recurrence/index.js';
import { irregularDailySeries } from './irregularService.js';
import { listRecurringRules, pendingWindowStart, toRecurrenceRule } from './recurringRuleService.js';
import { requireAccount, signedAmount } from './transactionService.js';

export type LedgerEntrySource = 'balance' | 'recorded' | 'projected' | 'irregular';

export type LedgerRow = {
  date: IsoDate;
  source: LedgerEntrySource;
  description: string;
  amountMinor: number;
  running: number;
  transactionId: number | null;
  recurringRuleId: number | null;
};

type LedgerEntry = Omit<LedgerRow, 'running'>;

const SOURCE_ORDER: Record<LedgerEntrySource, number> = {
  balance: 0,
  recorded: 1,
  projected: 2,
  irregular: 3,
};

function compareEntries(left: LedgerEntry, right: LedgerEntry): number {
  if (left.date !== right.date) {
    return left.date < right.date ? -1 : 1;
  }
  if (left.source !== right.source) {
    return SOURCE_ORDER[left.source] - SOURCE_ORDER[right.source];
  }
  return (left.transactionId ?? left.recurringRuleId ?? 0) - (right.transactionId ?? right.recurringRuleId ?? 0);
}

/**
 * Running balance of an account up to `through`. The ledger opens at the
 * latest balance snapshot on or before `through` and adds every recorded
 * transaction from that day on, plus the occurrences active recurring rules
 * have not recorded yet and the forecasts of active irregular categories.
 * Without a snapshot it opens at zero.
 */
export async function ledgerRows(accountId: number, through: IsoDate): Promise<LedgerRow[]> {
  if (!isIsoDate(through)) {
    throw HttpError.badRequest('through must be a YYYY-MM-DD date');
  }
  await requireAccount(accountId);

  const snapshot = await BudgetBalanceSnapshot.findOne({
    where: { accountId, recordedOn: { [Op.lte]: through } },
    order: [
      ['recordedOn', 'DESC'],
      ['id', 'DESC'],
    ],
  });
  const opensOn = snapshot?.recordedOn ?? null;

  const transactions = await BudgetTransaction.findAll({
    where: {
      accountId,
      date: opensOn ? { [Op.gte]: opensOn, [Op.lte]: through } : { [Op.lte]: through },
    },
    order: [
      ['date', 'ASC'],
      ['id', 'ASC'],
    ],
  });

  const entries: LedgerEntry[] = transactions.map((transaction): LedgerEntry => ({
    date: transaction.date,
    source: 'recorded',
    description: transaction.description,
    amountMinor: signedAmount(transaction),
    transactionId: transaction.id,
    recurringRuleId: transaction.recurringRuleId,
  }));

  const recordedKeys = new Set(
    transactions
      .filter((transaction) => transaction.recurringRuleId !== null)
      .map((transaction) => `${transaction.recurringRuleId}:${transaction.date}`),
  );

  const rules = await listRecurringRules({ status: 'active', accountId });
  for (const record of rules) {
    const rule = toRecurrenceRule(record);
    const pendingFrom = pendingWindowStart(record, rule, through);
    if (!pendingFrom) {
      continue;
    }
    const windowStart = opensOn && opensOn > pendingFrom ? opensOn : pendingFrom;
    for (const date of listOccurrences(rule, windowStart, through)) {
      if (recordedKeys.has(`${record.id}:${date}`)) {
        continue;
      }
      entries.push({
        date,
        source: 'projected',
        description: record.description,
        amountMinor: signedAmount(record),
        transactionId: null,
        recurringRuleId: record.id,
      });
    }
  }

  for (const point of await irregularDailySeries(accountId, opensOn, through)) {
    entries.push({
      date: point.date,
      source: 'irregular',
      description: 'Irregular',
      amountMinor: -point.amountMinor,
      transactionId: null,
      recurringRuleId: null,
    });
  }

  entries.sort(compareEntries);

  const rows: LedgerRow[] = [];
  let running = 0;
  if (snapshot) {
    running = snapshot.amountMinor;
    rows.push({
      date: snapshot.recordedOn,
      source: 'balance',
      description: 'Balance',
      amountMinor: snapshot.amountMinor,
      running,
      transactionId: null,
      recurringRuleId: null,
    });
  }
  for (const entry of entries) {
    running += entry.amountMinor;
    rows.push({ ...entry, running });
  }
  return rows;
}
