import { Router } from 'express';
import { body, param, query, ValidationChain } from 'express-validator';
import validateRequest from '../../middleware/validateRequest.js';
import { createAccountHandler, listAccountsHandler } from '../controllers/accountController.js';
import {
  listTransactions,
  getTransaction,
  createTransactionHandler,
  createTransferHandler,
  updateTransactionHandler,
  deleteTransactionHandler,
} from '../controllers/transactionController.js';
import {
  listRecurringRulesHandler,
  getRecurringRuleHandler,
  createRecurringRuleHandler,
  replaceRecurringRuleHandler,
  deleteRecurringRuleHandler,
  previewOccurrencesHandler,
  materializeRecurringRulesHandler,
} from '../controllers/recurringRuleController.js';
import {
  addIrregularRuleHandler,
  createIrregularCategoryHandler,
  forecastIrregularHandler,
  getIrregularCategoryHandler,
  learnIrregularStateHandler,
  listIrregularCategoriesHandler,
} from '../controllers/irregularController.js';
import { getBalanceHandler, setBalanceHandler } from '../controllers/balanceController.js';
import { createGoalHandler, listGoalsHandler, toggleGoalHandler } from '../controllers/goalController.js';
import { getLedgerHandler } from '../controllers/ledgerController.js';
import { BUDGET_ACCOUNT_TYPES } from '../models/BudgetAccount.js';
import { BUDGET_TRANSACTION_KINDS, BUDGET_TRANSACTION_STATUSES } from '../models/BudgetTransaction.js';

const router = Router();

const isoDate = (chain: ValidationChain) =>
  chain.isISO8601({ strict: true, strictSeparator: true }).withMessage('must be a YYYY-MM-DD date');

const accountId = (chain: ValidationChain) =>
  chain.optional().isInt({ gt: 0 }).withMessage('accountId must be a positive integer').toInt();

const isNullableString = (value: unknown) => value === null || typeof value === 'string';

const isNullableRecord = (value: unknown) => value === null || (typeof value === 'object' && !Array.isArray(value));

function isEndCondition(value: unknown): boolean {
  if (typeof value !== 'object' || value === null || !('type' in value)) {
    return false;
  }
  switch (value.type) {
    case 'never':
      return true;
    case 'until':
      return 'date' in value && typeof value.date === 'string';
    case 'count':
      return 'count' in value && typeof value.count === 'number';
    default:
      return false;
  }
}

const validateId = [param('id').isInt({ gt: 0 }).withMessage('ID must be a positive integer').toInt()];

const validateAccountQuery = [accountId(query('accountId'))];

const validateAccountListQuery = [query('includeArchived').optional().isBoolean().toBoolean()];

const validateAccountBody = [
  body('name').isString().trim().notEmpty().withMessage('Name is required'),
  body('type').optional({ values: 'null' }).isIn(BUDGET_ACCOUNT_TYPES).withMessage('Unknown account type'),
  body('institution').optional({ values: 'null' }).isString().trim(),
  body('currency').optional({ values: 'null' }).isString().isLength({ min: 3, max: 3 }).withMessage('Currency must be a 3-letter code'),
  body('last4').optional({ values: 'null' }).isString().isLength({ max: 8 }),
];

const validateTransactionQuery = [
  accountId(query('accountId')),
  query('kind').optional().isIn(BUDGET_TRANSACTION_KINDS).withMessage('kind must be income or expense'),
  query('recurringRuleId').optional().isInt({ gt: 0 }).toInt(),
  query('transferGroupId').optional().isUUID(),
  isoDate(query('dateFrom').optional()),
  isoDate(query('dateTo').optional()),
  query('limit').optional().isInt({ min: 1, max: 500 }).withMessage('limit must be between 1 and 500').toInt(),
  query('offset').optional().isInt({ min: 0 }).withMessage('offset must not be negative').toInt(),
];

const validateTransactionCreateBody = [
  body('kind').isIn(BUDGET_TRANSACTION_KINDS).withMessage('kind must be income or expense'),
  body('description').isString().trim().notEmpty().withMessage('Description is required'),
  body('amountMinor').isInt({ gt: 0 }).withMessage('amountMinor must be a positive integer').toInt(),
  isoDate(body('date')),
  accountId(body('accountId')),
  body('category').optional().custom(isNullableString).withMessage('category must be a string'),
  body('status').optional().isIn(BUDGET_TRANSACTION_STATUSES),
  body('meta').optional().custom(isNullableRecord).withMessage('meta must be an object'),
];

const validateTransactionUpdateBody = [
  body('kind').optional().isIn(BUDGET_TRANSACTION_KINDS),
  body('description').optional().isString().bail().trim().notEmpty().withMessage('Description is required'),
  body('amountMinor').optional().isInt({ gt: 0 }).withMessage('amountMinor must be a positive integer').toInt(),
  isoDate(body('date').optional()),
  accountId(body('accountId')),
  body('category').optional().custom(isNullableString).withMessage('category must be a string'),
  body('status').optional().isIn(BUDGET_TRANSACTION_STATUSES),
  body('meta').optional().custom(isNullableRecord).withMessage('meta must be an object'),
];

const validateTransferBody = [
  body('fromAccountId').isInt({ gt: 0 }).withMessage('fromAccountId must be a positive integer').toInt(),
  body('toAccountId').isInt({ gt: 0 }).withMessage('toAccountId must be a positive integer').toInt(),
  body('amountMinor').isInt({ gt: 0 }).withMessage('amountMinor must be a positive integer').toInt(),
  isoDate(body('date')),
  body('description').optional().isString().bail().trim().notEmpty().withMessage('Description is required'),
  body('status').optional().isIn(BUDGET_TRANSACTION_STATUSES),
];

const validateRecurringRuleQuery = [
  query('status').optional().isIn(['active', 'retired']).withMessage('status must be active or retired'),
  accountId(query('accountId')),
];

const validateRecurringRuleBody = [
  body('kind').isIn(BUDGET_TRANSACTION_KINDS).withMessage('kind must be income or expense'),
  body('description').isString().trim().notEmpty().withMessage('Description is required'),
  body('amountMinor').isInt({ gt: 0 }).withMessage('amountMinor must be a positive integer').toInt(),
  body('category').optional().custom(isNullableString).withMessage('category must be a string'),
  body('frequency').isString().trim().notEmpty().withMessage('Frequency is required'),
  body('interval').optional().isInt().withMessage('interval must be an integer').toInt(),
  isoDate(body('startDate')),
  accountId(body('accountId')),
  body('endCondition')
    .optional({ values: 'null' })
    .custom(isEndCondition)
    .withMessage('endCondition must be never, until with a date or count with a number'),
];

const validateWindowQuery = [isoDate(query('from')), isoDate(query('to'))];

const validateThroughBody = [isoDate(body('through')), accountId(body('accountId'))];

const validateBalanceBody = [
  body('amountMinor').isInt().withMessage('amountMinor must be an integer').toInt(),
  isoDate(body('recordedOn')),
  accountId(body('accountId')),
];

const validateGoalBody = [
  body('description').isString().trim().notEmpty().withMessage('Description is required'),
  body('amountMinor').isInt({ gt: 0 }).withMessage('amountMinor must be a positive integer').toInt(),
  isoDate(body('targetDate')),
  body('enabled').optional().isBoolean({ strict: true }),
  accountId(body('accountId')),
];

const validateLedgerQuery = [isoDate(query('through')), accountId(query('accountId'))];

const validateIrregularCategoryBody = [
  body('name').isString().trim().notEmpty().withMessage('Name is required'),
  accountId(body('accountId')),
  body('windowDays').optional().isInt({ gt: 0 }).withMessage('windowDays must be a positive integer').toInt(),
  body('alpha').optional().isFloat({ gt: 0, max: 1 }).withMessage('alpha must be greater than 0 and at most 1').toFloat(),
  body('patterns').optional().isArray().withMessage('patterns must be a list'),
  body('patterns.*').isString().withMessage('patterns must be strings'),
];

const validatePatternBody = [body('pattern').isString().trim().notEmpty().withMessage('pattern is required')];

const validateLearnBody = [isoDate(body('start').optional()), isoDate(body('end'))];

// Accounts
router.get('/accounts', validateAccountListQuery, validateRequest, listAccountsHandler);
router.post('/accounts', validateAccountBody, validateRequest, createAccountHandler);

// Transactions
router.get('/transactions', validateTransactionQuery, validateRequest, listTransactions);
router.get('/transactions/:id', validateId, validateRequest, getTransaction);
router.post('/transactions', validateTransactionCreateBody, validateRequest, createTransactionHandler);
router.put('/transactions/:id', [...validateId, ...validateTransactionUpdateBody], validateRequest, updateTransactionHandler);
router.delete('/transactions/:id', validateId, validateRequest, deleteTransactionHandler);
router.post('/transfers', validateTransferBody, validateRequest, createTransferHandler);

// Recurring rules
router.get('/recurring-rules', validateRecurringRuleQuery, validateRequest, listRecurringRulesHandler);
router.get('/recurring-rules/:id', validateId, validateRequest, getRecurringRuleHandler);
router.get(
  '/recurring-rules/:id/occurrences',
  [...validateId, ...validateWindowQuery],
  validateRequest,
  previewOccurrencesHandler,
);
router.post('/recurring-rules', validateRecurringRuleBody, validateRequest, createRecurringRuleHandler);
router.post(
  '/recurring-rules/:id/replace',
  [...validateId, ...validateRecurringRuleBody],
  validateRequest,
  replaceRecurringRuleHandler,
);
router.delete('/recurring-rules/:id', validateId, validateRequest, deleteRecurringRuleHandler);
router.post('/recurring-runs/materialize', validateThroughBody, validateRequest, materializeRecurringRulesHandler);

// Balance
router.get('/balance', validateAccountQuery, validateRequest, getBalanceHandler);
router.post('/balance', validateBalanceBody, validateRequest, setBalanceHandler);

// Goals
router.get('/goals', validateAccountQuery, validateRequest, listGoalsHandler);
router.post('/goals', validateGoalBody, validateRequest, createGoalHandler);
router.post('/goals/:id/toggle', validateId, validateRequest, toggleGoalHandler);

// Ledger
router.get('/ledger', validateLedgerQuery, validateRequest, getLedgerHandler);

// Irregular spending
router.get('/irregular-categories', validateAccountQuery, validateRequest, listIrregularCategoriesHandler);
router.post('/irregular-categories', validateIrregularCategoryBody, validateRequest, createIrregularCategoryHandler);
router.get('/irregular-categories/:id', validateId, validateRequest, getIrregularCategoryHandler);
router.post(
  '/irregular-categories/:id/rules',
  [...validateId, ...validatePatternBody],
  validateRequest,
  addIrregularRuleHandler,
);
router.post(
  '/irregular-categories/:id/learn',
  [...validateId, ...validateLearnBody],
  validateRequest,
  learnIrregularStateHandler,
);
router.get(
  '/irregular-categories/:id/forecast',
  [...validateId, ...validateWindowQuery],
  validateRequest,
  forecastIrregularHandler,
);

export default router;
