import {
  Table,
  Model,
  Column,
  DataType,
  PrimaryKey,
  AutoIncrement,
  AllowNull,
  Default,
  ForeignKey,
  BelongsTo,
  Index,
} from 'sequelize-typescript';
import BudgetAccount from './BudgetAccount.js';
import BudgetRecurringRule from './BudgetRecurringRule.js';

export type BudgetTransactionKind = 'income' | 'expense';
export type BudgetTransactionStatus = 'planned' | 'posted';

export const BUDGET_TRANSACTION_KINDS: BudgetTransactionKind[] = ['income', 'expense'];
export const BUDGET_TRANSACTION_STATUSES: BudgetTransactionStatus[] = ['planned', 'posted'];

@Table({
  tableName: 'budget_transactions',
  timestamps: true,
  underscored: true,
})
export default class BudgetTransaction extends Model {
  @PrimaryKey
  @AutoIncrement
  @Column(DataType.INTEGER)
  declare id: number;

  @AllowNull(false)
  @Column({ field: 'kind', type: DataType.ENUM(...BUDGET_TRANSACTION_KINDS) })
  declare kind: BudgetTransactionKind;

  @AllowNull(false)
  @Column(DataType.STRING(255))
  declare description: string;

  @AllowNull(false)
  @Column({ field: 'amount_minor', type: DataType.INTEGER })
  declare amountMinor: number;

  @AllowNull(false)
  @Index({ name: 'budget_transactions_rule_date_unique', unique: true })
  @Column({ field: 'date', type: DataType.DATEONLY })
  declare date: string;

  @ForeignKey(() => BudgetAccount)
  @AllowNull(false)
  @Default(1)
  @Column({ field: 'account_id', type: DataType.INTEGER })
  declare accountId: number;

  @BelongsTo(() => BudgetAccount, 'accountId')
  declare account?: BudgetAccount;

  @AllowNull(true)
  @Column(DataType.STRING(80))
  declare category: string | null;

  @AllowNull(false)
  @Default('posted')
  @Column({ field: 'status', type: DataType.ENUM(...BUDGET_TRANSACTION_STATUSES) })
  declare status: BudgetTransactionStatus;

  @ForeignKey(() => BudgetRecurringRule)
  @AllowNull(true)
  @Index({ name: 'budget_transactions_rule_date_unique', unique: true })
  @Column({ field: 'recurring_rule_id', type: DataType.INTEGER })
  declare recurringRuleId: number | null;

  @BelongsTo(() => BudgetRecurringRule, { foreignKey: 'recurringRuleId', constraints: false })
  declare recurringRule?: BudgetRecurringRule | null;

  @AllowNull(true)
  @Index('budget_transactions_transfer_group')
  @Column({ field: 'transfer_group_id', type: DataType.STRING(36) })
  declare transferGroupId: string | null;

  @AllowNull(true)
  @Column({ field: 'counterparty_account_id', type: DataType.INTEGER })
  declare counterpartyAccountId: number | null;

  @AllowNull(true)
  @Column({ field: 'meta', type: DataType.JSON })
  declare meta: Record<string, unknown> | null;

  @AllowNull(false)
  @Default(DataType.NOW)
  @Column({ field: 'created_at', type: DataType.DATE })
  declare createdAt: Date;

  @AllowNull(true)
  @Column({ field: 'updated_at', type: DataType.DATE })
  declare updatedAt: Date | null;
}
