import {
  Table,
  Model,
  Column,
  DataType,
  PrimaryKey,
  AutoIncrement,
  AllowNull,
  Default,
  Unique,
} from 'sequelize-typescript';

export type BudgetAccountType = 'checking' | 'savings' | 'credit' | 'cash' | 'other';

export const BUDGET_ACCOUNT_TYPES: BudgetAccountType[] = ['checking', 'savings', 'credit', 'cash', 'other'];

@Table({
  tableName: 'budget_accounts',
  timestamps: true,
  underscored: true,
})
export default class BudgetAccount extends Model {
  @PrimaryKey
  @AutoIncrement
  @Column(DataType.INTEGER)
  declare id: number;

  @AllowNull(false)
  @Unique('budget_accounts_name_unique')
  @Column(DataType.STRING(120))
  declare name: string;

  @AllowNull(false)
  @Default('checking')
  @Column(DataType.ENUM(...BUDGET_ACCOUNT_TYPES))
  declare type: BudgetAccountType;

  @AllowNull(true)
  @Column(DataType.STRING(120))
  declare institution: string | null;

  @AllowNull(true)
  @Column(DataType.STRING(8))
  declare last4: string | null;

  @AllowNull(false)
  @Default('USD')
  @Column(DataType.STRING(3))
  declare currency: string;

  @AllowNull(false)
  @Default(false)
  @Column(DataType.BOOLEAN)
  declare archived: boolean;

  @AllowNull(false)
  @Default(DataType.NOW)
  @Column({ field: 'created_at', type: DataType.DATE })
  declare createdAt: Date;

  @AllowNull(true)
  @Column({ field: 'updated_at', type: DataType.DATE })
  declare updatedAt: Date | null;
}
