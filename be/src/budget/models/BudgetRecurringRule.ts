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
} from 'sequelize-typescript';
import BudgetAccount from './BudgetAccount.js';
import type { BudgetTransactionKind } from './BudgetTransaction.js';
import { RECURRENCE_FREQUENCIES, RecurrenceEndType, RecurrenceFrequency } from '../../recurrence/index.js';

export type BudgetRecurringStatus = 'active' | 'retired';

/**
 * Stored form of a recurrence rule plus the amount and category each
 * occurrence is recorded with. Rows are never edited in place; a schedule
 * change retires the row and points `replacedById` at its successor.
 */
@Table({
  tableName: 'budget_recurring_rules',
  timestamps: true,
  underscored: true,
})
export default class BudgetRecurringRule extends Model {
  @PrimaryKey
  @AutoIncrement
  @Column(DataType.INTEGER)
  declare id: number;

  @AllowNull(false)
  @Column(DataType.ENUM('income', 'expense'))
  declare kind: BudgetTransactionKind;

  @AllowNull(false)
  @Column(DataType.STRING(255))
  declare description: string;

  @AllowNull(false)
  @Column({ field: 'amount_minor', type: DataType.INTEGER })
  declare amountMinor: number;

  @AllowNull(true)
  @Column(DataType.STRING(80))
  declare category: string | null;

  @ForeignKey(() => BudgetAccount)
  @AllowNull(false)
  @Default(1)
  @Column({ field: 'account_id', type: DataType.INTEGER })
  declare accountId: number;

  @BelongsTo(() => BudgetAccount, 'accountId')
  declare account?: BudgetAccount;

  @AllowNull(false)
  @Column({ field: 'frequency', type: DataType.ENUM(...RECURRENCE_FREQUENCIES) })
  declare frequency: RecurrenceFrequency;

  @AllowNull(false)
  @Default(1)
  @Column({ field: 'interval', type: DataType.INTEGER })
  declare interval: number;

  @AllowNull(false)
  @Column({ field: 'start_date', type: DataType.DATEONLY })
  declare startDate: string;

  @AllowNull(false)
  @Default('never')
  @Column({ field: 'end_type', type: DataType.ENUM('never', 'until', 'count') })
  declare endType: RecurrenceEndType;

  @AllowNull(true)
  @Column({ field: 'end_date', type: DataType.DATEONLY })
  declare endDate: string | null;

  @AllowNull(true)
  @Column({ field: 'occurrence_count', type: DataType.INTEGER })
  declare occurrenceCount: number | null;

  @AllowNull(false)
  @Default('active')
  @Column({ field: 'status', type: DataType.ENUM('active', 'retired') })
  declare status: BudgetRecurringStatus;

  @AllowNull(true)
  @Column({ field: 'replaced_by_id', type: DataType.INTEGER })
  declare replacedById: number | null;

  @AllowNull(true)
  @Column({ field: 'materialized_through', type: DataType.DATEONLY })
  declare materializedThrough: string | null;

  @AllowNull(false)
  @Default(DataType.NOW)
  @Column({ field: 'created_at', type: DataType.DATE })
  declare createdAt: Date;

  @AllowNull(true)
  @Column({ field: 'updated_at', type: DataType.DATE })
  declare updatedAt: Date | null;
}
