import { NextFunction, Request, Response } from 'express';
import { matchedData } from 'express-validator';
import {
  addIrregularRule,
  createIrregularCategory,
  forecastIrregular,
  getIrregularCategory,
  IrregularCategoryInput,
  learnIrregularState,
  listIrregularCategories,
} from '../services/irregularService.js';

type IdParams = { id: number };

export const listIrregularCategoriesHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    res.status(200).json(await listIrregularCategories(matchedData<{ accountId?: number }>(req).accountId));
  } catch (error) {
    next(error);
  }
};

export const getIrregularCategoryHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    res.status(200).json(await getIrregularCategory(matchedData<IdParams>(req).id));
  } catch (error) {
    next(error);
  }
};

export const createIrregularCategoryHandler = async (
  req: Request,
  res: Response,
  next: NextFunction,
): Promise<void> => {
  try {
    const category = await createIrregularCategory(matchedData<IrregularCategoryInput>(req));
    res.status(201).json(category);
  } catch (error) {
    next(error);
  }
};

export const addIrregularRuleHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { id, pattern } = matchedData<IdParams & { pattern: string }>(req);
    res.status(201).json(await addIrregularRule(id, pattern));
  } catch (error) {
    next(error);
  }
};

export const learnIrregularStateHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { id, ...window } = matchedData<IdParams & { start?: string; end: string }>(req);
    res.status(200).json(await learnIrregularState(id, window));
  } catch (error) {
    next(error);
  }
};

export const forecastIrregularHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { id, from, to } = matchedData<IdParams & { from: string; to: string }>(req);
    const points = await forecastIrregular(id, from, to);
    res.status(200).json({ data: points, meta: { from, to, count: points.length } });
  } catch (error) {
    next(error);
  }
};
