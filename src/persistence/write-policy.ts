import { Logger } from '@nestjs/common';
import { delay, errorMessage, withTimeout } from '../common/utils/async.utils';

const MONGO_DUPLICATE_KEY = 11000;

export interface RetryPolicy {
  attempts: number;
  attemptTimeoutMs: number;
  /** Base delay; attempt n waits delayMs * n before the next try */
  delayMs: number;
}

export class PersistenceExhaustedError extends Error {
  constructor(
    readonly operation: string,
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(`${operation} failed after ${attempts} attempts: ${errorMessage(lastError)}`);
    this.name = 'PersistenceExhaustedError';
  }
}

/**
 * A duplicate-key rejection means an earlier attempt already landed
 */
export function isDuplicateKeyError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  if ('code' in error && error.code === MONGO_DUPLICATE_KEY) return true;
  return error instanceof Error && /duplicate key/i.test(error.message);
}

/**
 * Run a write until it succeeds, each attempt time-boxed.
 *
 * @returns the attempt number that succeeded
 * @throws PersistenceExhaustedError once every attempt has failed
 */
export async function writeWithRetry(
  operation: string,
  write: () => Promise<void>,
  policy: RetryPolicy,
  logger: Logger,
): Promise<number> {
  const attempts = Math.max(1, Math.floor(policy.attempts));
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      await withTimeout(write, policy.attemptTimeoutMs, operation);
      return attempt;
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        logger.debug(`${operation}: duplicate key on attempt ${attempt}, already stored`);
        return attempt;
      }

      lastError = error;
      logger.warn(`${operation} failed (attempt ${attempt}/${attempts}): ${errorMessage(error)}`);

      if (attempt < attempts && policy.delayMs > 0) {
        await delay(policy.delayMs * attempt);
      }
    }
  }

  throw new PersistenceExhaustedError(operation, attempts, lastError);
}
