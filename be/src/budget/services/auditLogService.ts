import type { Transaction as SequelizeTransaction } from 'sequelize';
import BudgetAuditLog from '../models/BudgetAuditLog.js';

type AuditLogParams = {
  entity: string;
  entityId: number;
  action: string;
  changes?: Record<string, unknown> | null;
  metadata?: Record<string, unknown> | null;
};

export async function recordBudgetAuditLog(
  { entity, entityId, action, changes = null, metadata = null }: AuditLogParams,
  options?: { transaction?: SequelizeTransaction },
): Promise<BudgetAuditLog> {
  return BudgetAuditLog.create(
    {
      entity,
      entityId,
      action,
      changes,
      metadata,
    },
    { transaction: options?.transaction },
  );
}
