import BudgetAccount from './BudgetAccount.js';
import BudgetAuditLog from './BudgetAuditLog.js';
import BudgetBalanceSnapshot from './BudgetBalanceSnapshot.js';
import BudgetGoal from './BudgetGoal.js';
import BudgetIrregularCategory from './BudgetIrregularCategory.js';
import BudgetIrregularRule from './BudgetIrregularRule.js';
import BudgetIrregularState from './BudgetIrregularState.js';
import BudgetRecurringRule from './BudgetRecurringRule.js';
import BudgetTransaction from './BudgetTransaction.js';

export {
  BudgetAccount,
  BudgetAuditLog,
  BudgetBalanceSnapshot,
  BudgetGoal,
  BudgetIrregularCategory,
  BudgetIrregularRule,
  BudgetIrregularState,
  BudgetRecurringRule,
  BudgetTransaction,
};

export const budgetModels = [
  BudgetAccount,
  BudgetAuditLog,
  BudgetBalanceSnapshot,
  BudgetGoal,
  BudgetIrregularCategory,
  BudgetIrregularRule,
  BudgetIrregularState,
  BudgetRecurringRule,
  BudgetTransaction,
];
