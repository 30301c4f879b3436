import dotenv from 'dotenv';

const environment = (process.env.NODE_ENV || 'development').trim();
const envFile = environment === 'production' ? '.env.prod' : '.env.dev';

if (environment !== 'test') {
  const configResult = dotenv.config({ path: envFile });
  if (configResult.error) {
    console.warn(`dotenv: failed to load ${envFile}. Falling back to existing process.env values.`);
  }
}

function readPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    console.warn(`${name}=${raw} is not a positive integer, using ${fallback}`);
    return fallback;
  }
  return parsed;
}

function readFlag(name: string): boolean {
  return (process.env[name] ?? 'false').toLowerCase() === 'true';
}

export type BudgetConfig = {
  environment: string;
  port: number;
  databaseStorage: string;
  logLevel: string | undefined;
  logToFile: boolean;
  syncAlter: boolean;
  recurringCron: string;
  recurringHorizonDays: number;
};

export const config: BudgetConfig = {
  environment,
  port: readPositiveInt('PORT', 3001),
  databaseStorage: process.env.BUDGET_DB || 'budget.sqlite',
  logLevel: process.env.LOG_LEVEL,
  logToFile: readFlag('LOG_TO_FILE'),
  syncAlter: readFlag('DB_SYNC_ALTER'),
  recurringCron: process.env.BUDGET_RECURRING_CRON || '5 0 * * *',
  recurringHorizonDays: readPositiveInt('BUDGET_RECURRING_HORIZON_DAYS', 31),
};

export default config;
