import type { NextFunction, Request, Response } from 'express';
import HttpError from '../../errors/HttpError';
import { InvalidRuleError, InvalidWindowError } from '../../recurrence/index';
import logger from '../../utils/logger';
import errorMiddleware from '../errorMiddleware';

const createRequest = () => ({ method: 'POST', originalUrl: '/api/budget/recurring-rules' } as unknown as Request);

const createResponse = () => {
  const res = {
    status: jest.fn().mockReturnThis(),
    json: jest.fn().mockReturnThis(),
  };
  return res as unknown as Response & { status: jest.Mock; json: jest.Mock };
};

const next: NextFunction = jest.fn();

describe('errorMiddleware', () => {
  beforeEach(() => {
    jest.restoreAllMocks();
  });

  it('uses the status and details of an HttpError', () => {
    const res = createResponse();

    errorMiddleware(HttpError.conflict('Already replaced', { replacedById: 4 }), createRequest(), res, next);

    expect(res.status).toHaveBeenCalledWith(409);
    expect(res.json).toHaveBeenCalledWith({ error: { message: 'Already replaced', details: { replacedById: 4 } } });
  });

  it('maps rule errors to 400 with the offending field', () => {
    const res = createResponse();

    errorMiddleware(new InvalidRuleError('interval', 'Interval must be a positive integer'), createRequest(), res, next);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      error: { message: 'Interval must be a positive integer', details: { field: 'interval' } },
    });
  });

  it('maps window errors to 400 with the window bounds', () => {
    const res = createResponse();

    errorMiddleware(new InvalidWindowError('2023-02-01', '2023-01-01'), createRequest(), res, next);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      error: {
        message: 'Window end 2023-01-01 precedes window start 2023-02-01',
        details: { windowStart: '2023-02-01', windowEnd: '2023-01-01' },
      },
    });
  });

  it('logs unexpected errors and answers 500', () => {
    const errorSpy = jest.spyOn(logger, 'error').mockImplementation(() => logger);
    const res = createResponse();

    errorMiddleware(new Error('disk full'), createRequest(), res, next);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ error: { message: 'disk full' } });
    expect(errorSpy).toHaveBeenCalledWith('POST /api/budget/recurring-rules failed: disk full');
    expect(next).not.toHaveBeenCalled();
  });

  it('falls back to a generic message for values that are not errors', () => {
    jest.spyOn(logger, 'error').mockImplementation(() => logger);
    const res = createResponse();

    errorMiddleware('boom', createRequest(), res, next);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ error: { message: 'An unexpected error occurred' } });
  });
});
