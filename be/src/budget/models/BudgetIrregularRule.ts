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
import BudgetIrregularCategory from './BudgetIrregularCategory.js';

/** Case-insensitive substring that assigns a transaction description to a category. */
@Table({
  tableName: 'budget_irregular_rules',
  timestamps: false,
  underscored: true,
})
export default class BudgetIrregularRule extends Model {
  @PrimaryKey
  @AutoIncrement
  @Column(DataType.INTEGER)
  declare id: number;

  @ForeignKey(() => BudgetIrregularCategory)
  @AllowNull(false)
  @Index('budget_irregular_rules_category_pattern')
  @Column({ field: 'category_id', type: DataType.INTEGER })
  declare categoryId: number;

  @BelongsTo(() => BudgetIrregularCategory, 'categoryId')
  declare category?: BudgetIrregularCategory;

  @ForeignKey(() => BudgetAccount)
  @AllowNull(false)
  @Default(1)
  @Column({ field: 'account_id', type: DataType.INTEGER })
  declare accountId: number;

  @AllowNull(false)
  @Index('budget_irregular_rules_category_pattern')
  @Column(DataType.STRING(120))
  declare pattern: string;

  @AllowNull(false)
  @Default(true)
  @Column(DataType.BOOLEAN)
  declare active: boolean;
}
