import {
  Table,
  Model,
  Column,
  DataType,
  PrimaryKey,
  AutoIncrement,
  AllowNull,
  Default,
} from 'sequelize-typescript';

@Table({
  tableName: 'budget_audit_logs',
  timestamps: false,
  underscored: true,
})
export default class BudgetAuditLog extends Model {
  @PrimaryKey
  @AutoIncrement
  @Column(DataType.INTEGER)
  declare id: number;

  @AllowNull(false)
  @Column({ field: 'entity', type: DataType.STRING(80) })
  declare entity: string;

  @AllowNull(false)
  @Column({ field: 'entity_id', type: DataType.INTEGER })
  declare entityId: number;

  @AllowNull(false)
  @Column(DataType.STRING(40))
  declare action: string;

  @AllowNull(true)
  @Column(DataType.JSON)
  declare changes: Record<string, unknown> | null;

  @AllowNull(true)
  @Column(DataType.JSON)
  declare metadata: Record<string, unknown> | null;

  @AllowNull(false)
  @Default(DataType.NOW)
  @Column({ field: 'created_at', type: DataType.DATE })
  declare createdAt: Date;
}
