import cron, { ScheduledTask } from 'node-cron';
import dayjs from 'dayjs';
import config from '../../config/environment.js';
import logger from '../../utils/logger.js';
import { materializeRecurringRules } from '../services/recurringRuleService.js';

let task: ScheduledTask | null = null;

export function materializationHorizon(today: dayjs.Dayjs, horizonDays: number): string {
  return today.add(horizonDays, 'day').format('YYYY-MM-DD');
}

export async function runRecurringMaterialization(through: string): Promise<void> {
  try {
    const result = await materializeRecurringRules({ through });
    if (result.createdTransactions > 0) {
      logger.info(
        `Budget recurring job created ${result.createdTransactions} transactions through ${through} (processed=${result.processed}, skipped=${result.skipped})`,
      );
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Budget recurring job failed: ${message}`);
  }
}

export function startBudgetRecurringJob(): void {
  if (task) {
    task.stop();
  }

  const runner = () => runRecurringMaterialization(materializationHorizon(dayjs(), config.recurringHorizonDays));

  void runner();
  task = cron.schedule(config.recurringCron, () => {
    void runner();
  });
}
