import { NextFunction, Request, Response } from 'express';
import { matchedData } from 'express-validator';
import { BudgetGoalInput, createGoal, listGoals, toggleGoal } from '../services/goalService.js';

export const listGoalsHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    res.status(200).json(await listGoals(matchedData<{ accountId?: number }>(req).accountId));
  } catch (error) {
    next(error);
  }
};

export const createGoalHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const goal = await createGoal(matchedData<BudgetGoalInput>(req));
    res.status(201).json(goal);
  } catch (error) {
    next(error);
  }
};

export const toggleGoalHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    res.status(200).json(await toggleGoal(matchedData<{ id: number }>(req).id));
  } catch (error) {
    next(error);
  }
};
