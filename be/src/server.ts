import { ValidationError } from 'sequelize';
import app from './app.js';
import config from './config/environment.js';
import sequelize, { connectDatabase } from './config/database.js';
import logger from './utils/logger.js';
import { ensureDefaultAccount } from './budget/services/accountService.js';
import { startBudgetRecurringJob } from './budget/jobs/recurringJob.js';

async function bootstrap(): Promise<void> {
  logger.info(`Synchronizing database schema (alter=${config.syncAlter})`);
  try {
    await connectDatabase();
    await sequelize.sync({ force: false, alter: config.syncAlter });
    await ensureDefaultAccount();

    app.listen(config.port, '127.0.0.1', () => {
      logger.info(`Budget API listening on http://127.0.0.1:${config.port}`);
      startBudgetRecurringJob();
    });
  } catch (err) {
    if (err instanceof ValidationError) {
      logger.error(`Validation error: ${JSON.stringify(err.errors, null, 2)}`);
    } else {
      logger.error(`Database synchronization failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exitCode = 1;
  }
}

void bootstrap();
