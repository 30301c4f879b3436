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

@Table({
  tableName: 'budget_goals',
  timestamps: true,
  underscored: true,
})
export default class BudgetGoal extends Model {
  @PrimaryKey
  @AutoIncrement
  @Column(DataType.INTEGER)
  declare id: number;

  @AllowNull(false)
  @Column(DataType.STRING(255))
  declare description: string;

  @AllowNull(false)
  @Column({ field: 'amount_minor', type: DataType.INTEGER })
  declare amountMinor: number;

  @AllowNull(false)
  @Column({ field: 'target_date', type: DataType.DATEONLY })
  declare targetDate: string;

  @AllowNull(false)
  @Default(true)
  @Column(DataType.BOOLEAN)
  declare enabled: boolean;

  @ForeignKey(() => BudgetAccount)
  @AllowNull(false)
  @Default(1)
  @Column({ field: 'account_id', type: DataType.INTEGER })
  declare accountId: number;

  @BelongsTo(() => BudgetAccount, 'accountId')
  declare account?: BudgetAccount;

  @AllowNull(false)
  @Default(DataType.NOW)
  @Column({ field: 'created_at', type: DataType.DATE })
  declare createdAt: Date;

  @AllowNull(true)
  @Column({ field: 'updated_at', type: DataType.DATE })
  declare updatedAt: Date | null;
}
