import { NextFunction, Request, Response } from 'express';
import { matchedData } from 'express-validator';
import { ledgerRows } from '../services/ledgerService.js';
import { DEFAULT_ACCOUNT_ID } from '../services/transactionService.js';

export const getLedgerHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { accountId = DEFAULT_ACCOUNT_ID, through } = matchedData<{ accountId?: number; through: string }>(req);
    const rows = await ledgerRows(accountId, through);
    res.status(200).json({ data: rows, meta: { accountId, through } });
  } catch (error) {
    next(error);
  }
};
