import { Op, Transaction as SequelizeTransaction } from 'sequelize';
import sequelize from '../../config/database.js';
import BudgetIrregularCategory from '../models/BudgetIrregularCategory.js';
import BudgetIrregularRule from '../models/BudgetIrregularRule.js';
import BudgetIrregularState from '../models/BudgetIrregularState.js';
import BudgetTransaction from '../models/BudgetTransaction.js';
import HttpError from '../../errors/HttpError.js';
import logger from '../../utils/logger.js';
import { addIsoDays, daysBetween, isIsoDate, parseIsoDate, IsoDate } from '../../recurrence/index.js';
import { recordBudgetAuditLog } from './auditLogService.js';
import { assertDescription, DEFAULT_ACCOUNT_ID, requireAccount } from './transactionService.js';

export type IrregularCategoryInput = {
  name: string;
  accountId?: number;
  windowDays?: number;
  alpha?: number;
  patterns?: string[];
};

export type IrregularEvent = {
  date: IsoDate;
  amountMinor: number;
};

export type IrregularSummary = {
  avgGapDays: number | null;
  weekdayProbs: number[] | null;
  medianAmountMinor: number | null;
  lastEventOn: IsoDate | null;
};

export type IrregularForecastPoint = {
  date: IsoDate;
  amountMinor: number;
};

// Projected dates move at most this many days towards the likeliest weekday.
const WEEKDAY_REACH = 3;

function normalizePattern(pattern: string): string {
  const normalized = pattern.trim().toLowerCase();
  if (!normalized) {
    throw HttpError.badRequest('pattern is required');
  }
  return normalized;
}

function assertAlpha(alpha: number): number {
  if (!Number.isFinite(alpha) || alpha <= 0 || alpha > 1) {
    throw HttpError.badRequest('alpha must be greater than 0 and at most 1');
  }
  return alpha;
}

function assertWindowDays(windowDays: number): number {
  if (!Number.isInteger(windowDays) || windowDays < 1) {
    throw HttpError.badRequest('windowDays must be a positive integer');
  }
  return windowDays;
}

export async function createIrregularCategory(input: IrregularCategoryInput): Promise<BudgetIrregularCategory> {
  const name = assertDescription(input.name);
  const accountId = input.accountId ?? DEFAULT_ACCOUNT_ID;
  const windowDays = assertWindowDays(input.windowDays ?? 120);
  const alpha = assertAlpha(input.alpha ?? 0.3);
  const patterns = Array.from(new Set((input.patterns ?? []).map(normalizePattern)));

  return sequelize.transaction(async (transaction) => {
    await requireAccount(accountId, { transaction });
    if (await BudgetIrregularCategory.findOne({ where: { name }, transaction })) {
      throw HttpError.conflict(`Irregular category "${name}" already exists`);
    }

    const category = await BudgetIrregularCategory.create({ name, accountId, windowDays, alpha }, { transaction });
    await BudgetIrregularState.create({ categoryId: category.id }, { transaction });
    for (const pattern of patterns) {
      await BudgetIrregularRule.create({ categoryId: category.id, accountId, pattern }, { transaction });
    }

    await recordBudgetAuditLog(
      {
        entity: 'budget_irregular_category',
        entityId: category.id,
        action: 'create',
        changes: { name, accountId, windowDays, alpha, patterns },
      },
      { transaction },
    );
    return category;
  });
}

export async function getIrregularCategory(
  id: number,
  options?: { transaction?: SequelizeTransaction },
): Promise<BudgetIrregularCategory> {
  const category = await BudgetIrregularCategory.findByPk(id, {
    include: [BudgetIrregularState],
    transaction: options?.transaction,
  });
  if (!category) {
    throw HttpError.notFound('Irregular category', id);
  }
  return category;
}

export async function listIrregularCategories(
  accountId: number = DEFAULT_ACCOUNT_ID,
): Promise<BudgetIrregularCategory[]> {
  return BudgetIrregularCategory.findAll({
    where: { accountId },
    include: [BudgetIrregularState],
    order: [['name', 'ASC']],
  });
}

export async function addIrregularRule(categoryId: number, pattern: string): Promise<BudgetIrregularRule> {
  const category = await getIrregularCategory(categoryId);
  const normalized = normalizePattern(pattern);
  const existing = await BudgetIrregularRule.findOne({ where: { categoryId, pattern: normalized } });
  if (existing) {
    throw HttpError.conflict(`Pattern "${normalized}" already belongs to ${category.name}`);
  }
  return BudgetIrregularRule.create({ categoryId, accountId: category.accountId, pattern: normalized });
}

export async function rulesFor(categoryId: number): Promise<string[]> {
  const rules = await BudgetIrregularRule.findAll({
    where: { categoryId, active: true },
    order: [['id', 'ASC']],
  });
  return rules.map((rule) => rule.pattern);
}

/** Category of the oldest active rule whose pattern occurs in `description`, ignoring case. */
export async function matchCategoryId(description: string, accountId: number = DEFAULT_ACCOUNT_ID): Promise<number | null> {
  const haystack = description.toLowerCase();
  const rules = await BudgetIrregularRule.findAll({
    where: { accountId, active: true },
    include: [{ model: BudgetIrregularCategory, where: { active: true }, attributes: [] }],
    order: [['id', 'ASC']],
  });
  const match = rules.find((rule) => haystack.includes(rule.pattern));
  return match ? match.categoryId : null;
}

function median(values: number[]): number {
  const sorted = [...values].sort((left, right) => left - right);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[middle] : Math.round((sorted[middle - 1] + sorted[middle]) / 2);
}

function weekdayOf(date: IsoDate): number {
  const parsed = parseIsoDate(date);
  if (!parsed) {
    throw new Error(`Invalid date: ${date}`);
  }
  return parsed.day();
}

/**
 * Learns the rhythm of a list of spending events: an exponentially smoothed
 * gap between event days, Laplace-smoothed weekday probabilities (Sunday
 * first), the median amount and the last event day.
 */
export function summarizeIrregularEvents(events: IrregularEvent[], alpha: number): IrregularSummary {
  if (events.length === 0) {
    return { avgGapDays: null, weekdayProbs: null, medianAmountMinor: null, lastEventOn: null };
  }

  const days = Array.from(new Set(events.map((event) => event.date))).sort();
  let avgGapDays: number | null = null;
  for (let index = 1; index < days.length; index += 1) {
    const gap = daysBetween(days[index - 1], days[index]);
    avgGapDays = avgGapDays === null ? gap : alpha * gap + (1 - alpha) * avgGapDays;
  }

  const counts = [0, 0, 0, 0, 0, 0, 0];
  for (const event of events) {
    counts[weekdayOf(event.date)] += 1;
  }
  const weekdayProbs = counts.map((count) => (count + 1) / (events.length + 7));

  return {
    avgGapDays,
    weekdayProbs,
    medianAmountMinor: median(events.map((event) => event.amountMinor)),
    lastEventOn: days[days.length - 1],
  };
}

function alignToWeekday(nominal: IsoDate, weekdayProbs: number[] | null): IsoDate {
  if (!weekdayProbs) {
    return nominal;
  }
  let best = nominal;
  let bestProbability = weekdayProbs[weekdayOf(nominal)];
  for (let distance = 1; distance <= WEEKDAY_REACH; distance += 1) {
    for (const candidate of [addIsoDays(nominal, -distance), addIsoDays(nominal, distance)]) {
      const probability = weekdayProbs[weekdayOf(candidate)];
      if (probability > bestProbability) {
        best = candidate;
        bestProbability = probability;
      }
    }
  }
  return best;
}

/**
 * Deterministic projection: one event of the median amount every rounded
 * average gap after the last event, inside `[start, end]`. With gaps of a
 * week or more each event moves to the likeliest nearby weekday.
 */
export function forecastFromState(state: IrregularSummary, start: IsoDate | null, end: IsoDate): IrregularForecastPoint[] {
  const { avgGapDays, medianAmountMinor, lastEventOn } = state;
  if (avgGapDays === null || medianAmountMinor === null || lastEventOn === null) {
    return [];
  }
  const gap = Math.max(1, Math.round(avgGapDays));
  const weekdayProbs = gap >= 2 * WEEKDAY_REACH + 1 ? state.weekdayProbs : null;

  const points: IrregularForecastPoint[] = [];
  const lastNominal = weekdayProbs ? addIsoDays(end, WEEKDAY_REACH) : end;
  for (let nominal = addIsoDays(lastEventOn, gap); nominal <= lastNominal; nominal = addIsoDays(nominal, gap)) {
    const date = alignToWeekday(nominal, weekdayProbs);
    if ((start === null || date >= start) && date <= end) {
      points.push({ date, amountMinor: medianAmountMinor });
    }
  }
  return points;
}

function summaryOf(state: BudgetIrregularState | undefined): IrregularSummary {
  return {
    avgGapDays: state?.avgGapDays ?? null,
    weekdayProbs: state?.weekdayProbs ?? null,
    medianAmountMinor: state?.medianAmountMinor ?? null,
    lastEventOn: state?.lastEventOn ?? null,
  };
}

/**
 * Re-learns a category from the posted expenses of its account whose
 * description matches one of its patterns. Scheduled and transfer rows are
 * left out. Without `start` the category's `windowDays` ending at `end` is used.
 */
export async function learnIrregularState(
  categoryId: number,
  { start, end }: { start?: IsoDate; end: IsoDate },
): Promise<BudgetIrregularState> {
  if (!isIsoDate(end) || (start !== undefined && !isIsoDate(start))) {
    throw HttpError.badRequest('start and end must be YYYY-MM-DD dates');
  }
  const category = await getIrregularCategory(categoryId);
  const from = start ?? addIsoDays(end, 1 - category.windowDays);
  if (from > end) {
    throw HttpError.badRequest(`start ${from} is after end ${end}`);
  }

  const patterns = await rulesFor(categoryId);
  const candidates = await BudgetTransaction.findAll({
    where: {
      accountId: category.accountId,
      kind: 'expense',
      status: 'posted',
      recurringRuleId: null,
      transferGroupId: null,
      date: { [Op.gte]: from, [Op.lte]: end },
    },
    order: [
      ['date', 'ASC'],
      ['id', 'ASC'],
    ],
  });
  const events = candidates
    .filter((transaction) => {
      const description = transaction.description.toLowerCase();
      return patterns.some((pattern) => description.includes(pattern));
    })
    .map((transaction): IrregularEvent => ({ date: transaction.date, amountMinor: transaction.amountMinor }));

  const summary = summarizeIrregularEvents(events, category.alpha);
  const [state] = await BudgetIrregularState.findOrCreate({ where: { categoryId } });
  await state.update(summary);
  logger.debug(`Irregular category ${categoryId}: learned from ${events.length} events between ${from} and ${end}`);
  return state;
}

export async function forecastIrregular(
  categoryId: number,
  start: IsoDate,
  end: IsoDate,
): Promise<IrregularForecastPoint[]> {
  if (!isIsoDate(start) || !isIsoDate(end)) {
    throw HttpError.badRequest('start and end must be YYYY-MM-DD dates');
  }
  const category = await getIrregularCategory(categoryId);
  return forecastFromState(summaryOf(category.state), start, end);
}

/** Forecasts of every active category of an account, summed per day. */
export async function irregularDailySeries(
  accountId: number,
  start: IsoDate | null,
  end: IsoDate,
): Promise<IrregularForecastPoint[]> {
  const categories = await BudgetIrregularCategory.findAll({
    where: { accountId, active: true },
    include: [BudgetIrregularState],
    order: [['id', 'ASC']],
  });

  const totals = new Map<IsoDate, number>();
  for (const category of categories) {
    for (const point of forecastFromState(summaryOf(category.state), start, end)) {
      totals.set(point.date, (totals.get(point.date) ?? 0) + point.amountMinor);
    }
  }
  return Array.from(totals, ([date, amountMinor]) => ({ date, amountMinor })).sort((left, right) =>
    left.date < right.date ? -1 : 1,
  );
}
