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
  HasOne,
  HasMany,
  Unique,
} from 'sequelize-typescript';
import BudgetAccount from './BudgetAccount.js';
import BudgetIrregularState from './BudgetIrregularState.js';
import BudgetIrregularRule from './BudgetIrregularRule.js';

/** Spending that happens often but not on a schedule, such as groceries or car repairs. */
@Table({
  tableName: 'budget_irregular_categories',
  timestamps: true,
  underscored: true,
})
export default class BudgetIrregularCategory extends Model {
  @PrimaryKey
  @AutoIncrement
  @Column(DataType.INTEGER)
  declare id: number;

  @AllowNull(false)
  @Unique('budget_irregular_categories_name_unique')
  @Column(DataType.STRING(120))
  declare name: string;

  @AllowNull(false)
  @Default(true)
  @Column(DataType.BOOLEAN)
  declare active: boolean;

  @AllowNull(false)
  @Default(120)
  @Column({ field: 'window_days', type: DataType.INTEGER })
  declare windowDays: number;

  @AllowNull(false)
  @Default(0.3)
  @Column({ field: 'alpha', type: DataType.FLOAT })
  declare alpha: number;

  @ForeignKey(() => BudgetAccount)
  @AllowNull(false)
  @Default(1)
  @Column({ field: 'account_id', type: DataType.INTEGER })
  declare accountId: number;

  @BelongsTo(() => BudgetAccount, 'accountId')
  declare account?: BudgetAccount;

  @HasOne(() => BudgetIrregularState, 'categoryId')
  declare state?: BudgetIrregularState;

  @HasMany(() => BudgetIrregularRule, 'categoryId')
  declare rules?: BudgetIrregularRule[];

  @AllowNull(false)
  @Default(DataType.NOW)
  @Column({ field: 'created_at', type: DataType.DATE })
  declare createdAt: Date;

  @AllowNull(true)
  @Column({ field: 'updated_at', type: DataType.DATE })
  declare updatedAt: Date | null;
}
