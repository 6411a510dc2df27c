import { logger } from './logger';

export class UptimeError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public recoverable: boolean = false
  ) {
    super(message);
    this.name = 'UptimeError';
  }
}

/**
 * Precondition violation handed to the estimation pipeline: unsorted
 * observations, inverted or overlapping intervals, negative durations.
 * Aborts the affected store only.
 */
export class InvalidInputError extends UptimeError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT', 400, true);
    this.name = 'InvalidInputError';
  }
}

export class JobFailure extends UptimeError {
  constructor(message: string, public jobId?: string) {
    super(message, 'JOB_FAILED', 500, false);
    this.name = 'JobFailure';
  }
}

export class JobCancelledError extends UptimeError {
  constructor(jobId?: string) {
    super(jobId ? `Report ${jobId} was cancelled` : 'Report was cancelled', 'JOB_CANCELLED', 409, false);
    this.name = 'JobCancelledError';
  }
}

export class DataLoadError extends UptimeError {
  constructor(message: string) {
    super(message, 'DATA_LOAD_FAILED', 500, false);
    this.name = 'DataLoadError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Handles errors with appropriate logging
 */
export function handleError(error: unknown, context: string): void {
  if (error instanceof UptimeError) {
    logger.error(`[${context}] ${error.code}: ${error.message}`);
    if (error.recoverable) {
      logger.info(`[${context}] Error is recoverable, continuing with remaining work`);
    }
  } else {
    logger.error(`[${context}] Unexpected error: ${errorMessage(error)}`);
    if (error instanceof Error && error.stack) {
      logger.debug(`[${context}] Stack trace: ${error.stack}`);
    }
  }
}

/**
 * Wraps async functions with error handling
 */
export function withErrorHandling<A extends unknown[], R>(
  fn: (...args: A) => Promise<R>,
  context: string
): (...args: A) => Promise<R> {
  return async (...args: A) => {
    try {
      return await fn(...args);
    } catch (error) {
      handleError(error, context);
      throw error;
    }
  };
}
