import {
  Table,
  Model,
  Column,
  DataType,
  PrimaryKey,
  AutoIncrement,
  AllowNull,
  ForeignKey,
  BelongsTo,
  Unique,
} from 'sequelize-typescript';
import BudgetIrregularCategory from './BudgetIrregularCategory.js';

@Table({
  tableName: 'budget_irregular_states',
  timestamps: true,
  createdAt: false,
  underscored: true,
})
export default class BudgetIrregularState extends Model {
  @PrimaryKey
  @AutoIncrement
  @Column(DataType.INTEGER)
  declare id: number;

  @ForeignKey(() => BudgetIrregularCategory)
  @AllowNull(false)
  @Unique('budget_irregular_states_category_unique')
  @Column({ field: 'category_id', type: DataType.INTEGER })
  declare categoryId: number;

  @BelongsTo(() => BudgetIrregularCategory, 'categoryId')
  declare category?: BudgetIrregularCategory;

  @AllowNull(true)
  @Column({ field: 'avg_gap_days', type: DataType.FLOAT })
  declare avgGapDays: number | null;

  /** Seven probabilities, Sunday first. */
  @AllowNull(true)
  @Column({ field: 'weekday_probs', type: DataType.JSON })
  declare weekdayProbs: number[] | null;

  @AllowNull(true)
  @Column({ field: 'median_amount_minor', type: DataType.INTEGER })
  declare medianAmountMinor: number | null;

  @AllowNull(true)
  @Column({ field: 'last_event_on', type: DataType.DATEONLY })
  declare lastEventOn: string | null;

  @AllowNull(true)
  @Column({ field: 'updated_at', type: DataType.DATE })
  declare updatedAt: Date | null;
}
