import sequelize, { connectDatabase } from '../src/config/database.js';
import logger from '../src/utils/logger.js';
import { ensureDefaultAccount } from '../src/budget/services/accountService.js';
import { materializeRecurringRules } from '../src/budget/services/recurringRuleService.js';
import { isIsoDate } from '../src/recurrence/index.js';

async function main() {
  const through = process.argv[2];
  if (!through || !isIsoDate(through)) {
    console.error('Usage: npm run materialize -- <YYYY-MM-DD>');
    process.exitCode = 1;
    return;
  }

  await connectDatabase();
  try {
    await sequelize.sync();
    await ensureDefaultAccount();
    const result = await materializeRecurringRules({ through });
    logger.info(
      `Recorded ${result.createdTransactions} planned transactions through ${through} (rules=${result.processed}, already recorded=${result.skipped})`,
    );
  } finally {
    await sequelize.close();
  }
}

main().catch((error: unknown) => {
  logger.error(`Materialization failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
