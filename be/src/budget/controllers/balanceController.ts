import { NextFunction, Request, Response } from 'express';
import { matchedData } from 'express-validator';
import HttpError from '../../errors/HttpError.js';
import { latestBalance, setBalance } from '../services/balanceService.js';
import { DEFAULT_ACCOUNT_ID } from '../services/transactionService.js';

type BalanceFields = { accountId?: number; amountMinor: number; recordedOn: string };

export const setBalanceHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { accountId = DEFAULT_ACCOUNT_ID, amountMinor, recordedOn } = matchedData<BalanceFields>(req);
    const snapshot = await setBalance(accountId, amountMinor, recordedOn);
    res.status(201).json(snapshot);
  } catch (error) {
    next(error);
  }
};

export const getBalanceHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { accountId = DEFAULT_ACCOUNT_ID } = matchedData<{ accountId?: number }>(req);
    const snapshot = await latestBalance(accountId);
    if (!snapshot) {
      throw new HttpError(404, `No balance recorded for account ${accountId}`);
    }
    res.status(200).json(snapshot);
  } catch (error) {
    next(error);
  }
};
