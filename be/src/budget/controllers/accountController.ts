import { NextFunction, Request, Response } from 'express';
import { matchedData } from 'express-validator';
import { BudgetAccountInput, createAccount, listAccounts } from '../services/accountService.js';

export const listAccountsHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { includeArchived = false } = matchedData<{ includeArchived?: boolean }>(req);
    res.status(200).json(await listAccounts(includeArchived));
  } catch (error) {
    next(error);
  }
};

export const createAccountHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const account = await createAccount(matchedData<BudgetAccountInput>(req));
    res.status(201).json(account);
  } catch (error) {
    next(error);
  }
};
