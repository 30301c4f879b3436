import { NextFunction, Request, Response } from 'express';
import { matchedData } from 'express-validator';
import { BudgetRecurringStatus } from '../models/BudgetRecurringRule.js';
import {
  createRecurringRule,
  deleteRecurringRule,
  getRecurringRule,
  listRecurringRules,
  materializeRecurringRules,
  previewOccurrences,
  RecurringRuleInput,
  replaceRecurringRule,
} from '../services/recurringRuleService.js';

type IdParams = { id: number };

export const listRecurringRulesHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const filters = matchedData<{ status?: BudgetRecurringStatus; accountId?: number }>(req);
    res.status(200).json(await listRecurringRules(filters));
  } catch (error) {
    next(error);
  }
};

export const getRecurringRuleHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    res.status(200).json(await getRecurringRule(matchedData<IdParams>(req).id));
  } catch (error) {
    next(error);
  }
};

export const createRecurringRuleHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const rule = await createRecurringRule(matchedData<RecurringRuleInput>(req));
    res.status(201).json(rule);
  } catch (error) {
    next(error);
  }
};

export const replaceRecurringRuleHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { id, ...input } = matchedData<IdParams & RecurringRuleInput>(req);
    const result = await replaceRecurringRule(id, input);
    res.status(201).json(result);
  } catch (error) {
    next(error);
  }
};

export const deleteRecurringRuleHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    await deleteRecurringRule(matchedData<IdParams>(req).id);
    res.status(204).send();
  } catch (error) {
    next(error);
  }
};

export const previewOccurrencesHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { id, from, to } = matchedData<IdParams & { from: string; to: string }>(req);
    const dates = await previewOccurrences(id, from, to);
    res.status(200).json({ data: dates, meta: { from, to, count: dates.length } });
  } catch (error) {
    next(error);
  }
};

export const materializeRecurringRulesHandler = async (
  req: Request,
  res: Response,
  next: NextFunction,
): Promise<void> => {
  try {
    const result = await materializeRecurringRules(matchedData<{ through: string; accountId?: number }>(req));
    res.status(200).json(result);
  } catch (error) {
    next(error);
  }
};
