import sequelize from '../../../config/database';
import { ensureDefaultAccount } from '../accountService';

export async function resetDatabase(): Promise<void> {
  await sequelize.sync({ force: true });
  await ensureDefaultAccount();
}

export async function closeDatabase(): Promise<void> {
  await sequelize.close();
}
