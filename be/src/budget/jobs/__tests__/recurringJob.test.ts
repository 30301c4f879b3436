import dayjs from 'dayjs';
import logger from '../../../utils/logger';
import { materializationHorizon, runRecurringMaterialization } from '../recurringJob';

describe('recurringJob', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('computes the horizon across month ends', () => {
    expect(materializationHorizon(dayjs('2023-01-31'), 31)).toBe('2023-03-03');
    expect(materializationHorizon(dayjs('2024-02-28'), 1)).toBe('2024-02-29');
  });

  it('logs a failed run instead of throwing', async () => {
    const errorSpy = jest.spyOn(logger, 'error').mockImplementation(() => logger);

    await expect(runRecurringMaterialization('not-a-date')).resolves.toBeUndefined();

    expect(errorSpy).toHaveBeenCalledWith('Budget recurring job failed: through must be a YYYY-MM-DD date');
  });
});
