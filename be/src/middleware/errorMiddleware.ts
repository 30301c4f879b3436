import { Request, Response, NextFunction } from 'express';
import { ValidationError, UniqueConstraintError } from 'sequelize';
import logger from '../utils/logger.js';
import HttpError from '../errors/HttpError.js';
import { InvalidRuleError, InvalidWindowError } from '../recurrence/index.js';

type ErrorBody = {
  error: {
    message: string;
    details?: unknown;
  };
};

function resolveStatus(err: unknown): number {
  if (err instanceof HttpError) {
    return err.status;
  }
  if (err instanceof InvalidRuleError || err instanceof InvalidWindowError) {
    return 400;
  }
  if (err instanceof UniqueConstraintError) {
    return 409;
  }
  if (err instanceof ValidationError) {
    return 400;
  }
  return 500;
}

function resolveDetails(err: unknown): unknown {
  if (err instanceof HttpError) {
    return err.details;
  }
  if (err instanceof InvalidRuleError) {
    return { field: err.field };
  }
  if (err instanceof InvalidWindowError) {
    return { windowStart: err.windowStart, windowEnd: err.windowEnd };
  }
  if (err instanceof ValidationError) {
    return err.errors.map((item) => ({ path: item.path, message: item.message }));
  }
  return undefined;
}

// Express only treats a middleware as an error handler when it declares all four parameters.
const errorMiddleware = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const status = resolveStatus(err);
  const message = err instanceof Error && err.message ? err.message : 'An unexpected error occurred';

  if (status >= 500) {
    logger.error(`${req.method} ${req.originalUrl} failed: ${message}`);
  } else {
    logger.warn(`${req.method} ${req.originalUrl} rejected (${status}): ${message}`);
  }

  const body: ErrorBody = { error: { message } };
  const details = resolveDetails(err);
  if (details !== undefined) {
    body.error.details = details;
  }
  res.status(status).json(body);
};

export default errorMiddleware;
