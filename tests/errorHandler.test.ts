import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  InvalidInputError,
  JobCancelledError,
  UptimeError,
  errorMessage,
  handleError,
  withErrorHandling,
} from '../src/utils/errorHandler';
import { logger } from '../src/utils/logger';

vi.mock('../src/utils/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn()
  }
}));

describe('errorHandler', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should carry codes and status codes on the error hierarchy', () => {
    const invalid = new InvalidInputError('observations are not sorted');
    const cancelled = new JobCancelledError('job-1');

    expect(invalid).toBeInstanceOf(UptimeError);
    expect(invalid).toMatchObject({ code: 'INVALID_INPUT', statusCode: 400, recoverable: true, name: 'InvalidInputError' });
    expect(cancelled.message).toBe('Report job-1 was cancelled');
    expect(cancelled.code).toBe('JOB_CANCELLED');
  });

  it('should describe unknown thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain string')).toBe('plain string');
  });

  it('should log recoverable errors with their code', () => {
    handleError(new InvalidInputError('bad interval'), 'store s1');

    expect(logger.error).toHaveBeenCalledWith('[store s1] INVALID_INPUT: bad interval');
    expect(logger.info).toHaveBeenCalledWith('[store s1] Error is recoverable, continuing with remaining work');
  });

  it('should log and rethrow from wrapped functions', async () => {
    const wrapped = withErrorHandling(async (value: number) => {
      if (value < 0) throw new Error('negative');
      return value * 2;
    }, 'doubling');

    expect(await wrapped(2)).toBe(4);
    await expect(wrapped(-1)).rejects.toThrow('negative');
    expect(logger.error).toHaveBeenCalledWith('[doubling] Unexpected error: negative');
  });
});
