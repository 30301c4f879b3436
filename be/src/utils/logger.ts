import winston from 'winston';
import config from '../config/environment.js';

type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const logLevels: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

const LOG_LEVEL_VALUES: LogLevel[] = ['error', 'warn', 'info', 'debug'];

function resolveConsoleLevel(raw: string | undefined): LogLevel {
  const level = (raw ?? '').toLowerCase();
  const match = LOG_LEVEL_VALUES.find((candidate) => candidate === level);
  if (match) {
    return match;
  }
  return config.environment === 'test' ? 'error' : 'debug';
}

const transports: winston.transport[] = [new winston.transports.Console({ level: resolveConsoleLevel(config.logLevel) })];

if (config.logToFile) {
  transports.push(
    new winston.transports.File({ filename: 'error.log', level: 'error' }),
    new winston.transports.File({ filename: 'combined.log' }),
  );
}

const logger = winston.createLogger({
  levels: logLevels,
  format: winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message }) => {
      return `${timestamp} ${level}: ${message}`;
    }),
  ),
  transports,
});

export default logger;
