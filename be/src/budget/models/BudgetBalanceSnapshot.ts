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

@Table({
  tableName: 'budget_balance_snapshots',
  timestamps: true,
  underscored: true,
})
export default class BudgetBalanceSnapshot extends Model {
  @PrimaryKey
  @AutoIncrement
  @Column(DataType.INTEGER)
  declare id: number;

  @ForeignKey(() => BudgetAccount)
  @AllowNull(false)
  @Default(1)
  @Index('budget_balance_snapshots_account_recorded_on')
  @Column({ field: 'account_id', type: DataType.INTEGER })
  declare accountId: number;

  @BelongsTo(() => BudgetAccount, 'accountId')
  declare account?: BudgetAccount;

  @AllowNull(false)
  @Column({ field: 'amount_minor', type: DataType.INTEGER })
  declare amountMinor: number;

  @AllowNull(false)
  @Index('budget_balance_snapshots_account_recorded_on')
  @Column({ field: 'recorded_on', type: DataType.DATEONLY })
  declare recordedOn: string;

  @AllowNull(false)
  @Default(DataType.NOW)
  @Column({ field: 'created_at', type: DataType.DATE })
  declare createdAt: Date;

  @AllowNull(true)
  @Column({ field: 'updated_at', type: DataType.DATE })
  declare updatedAt: Date | null;
}
