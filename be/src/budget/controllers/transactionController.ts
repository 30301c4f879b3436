import { NextFunction, Request, Response } from 'express';
import { matchedData } from 'express-validator';
import BudgetTransaction from '../models/BudgetTransaction.js';
import HttpError from '../../errors/HttpError.js';
import {
  BudgetTransactionChanges,
  BudgetTransactionFilters,
  BudgetTransactionInput,
  BudgetTransferInput,
  createBudgetTransaction,
  createTransfer,
  deleteBudgetTransaction,
  listBudgetTransactions,
  updateBudgetTransaction,
} from '../services/transactionService.js';

type IdParams = { id: number };

export const listTransactions = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { limit = 50, offset = 0, ...filters } = matchedData<BudgetTransactionFilters>(req);
    const { rows, count } = await listBudgetTransactions({ ...filters, limit, offset });
    res.status(200).json({ data: rows, meta: { count, limit, offset } });
  } catch (error) {
    next(error);
  }
};

export const getTransaction = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { id } = matchedData<IdParams>(req);
    const transaction = await BudgetTransaction.findByPk(id);
    if (!transaction) {
      throw HttpError.notFound('Transaction', id);
    }
    res.status(200).json(transaction);
  } catch (error) {
    next(error);
  }
};

export const createTransactionHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const transaction = await createBudgetTransaction(matchedData<BudgetTransactionInput>(req));
    res.status(201).json(transaction);
  } catch (error) {
    next(error);
  }
};

export const updateTransactionHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { id, ...changes } = matchedData<IdParams & BudgetTransactionChanges>(req);
    const transaction = await updateBudgetTransaction(id, changes);
    res.status(200).json(transaction);
  } catch (error) {
    next(error);
  }
};

export const deleteTransactionHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    await deleteBudgetTransaction(matchedData<IdParams>(req).id);
    res.status(204).send();
  } catch (error) {
    next(error);
  }
};

export const createTransferHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const transfer = await createTransfer(matchedData<BudgetTransferInput>(req));
    res.status(201).json(transfer);
  } catch (error) {
    next(error);
  }
};
