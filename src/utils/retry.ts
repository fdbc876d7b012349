import { createLogger } from './loggers';

const logger = createLogger('retry');

export type RetryPredicate = (error: unknown) => boolean;

/**
 * Runs `fn` until it succeeds or the attempts run out, waiting `delay`ms
 * (multiplied by `backoff` each time) between attempts. Errors for which
 * `shouldRetry` returns false are thrown at once.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  retries: number = 3,
  delay: number = 1000,
  backoff: number = 2,
  shouldRetry: RetryPredicate = () => true,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (!shouldRetry(error)) {
      throw error;
    }
    if (retries <= 0) {
      logger.error('Retries exhausted', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    logger.warn(`Attempt failed, retrying in ${delay}ms`, {
      retriesLeft: retries,
      error: error instanceof Error ? error.message : String(error),
    });
    await new Promise((resolve) => setTimeout(resolve, delay));
    return retry(fn, retries - 1, delay * backoff, backoff, shouldRetry);
  }
}
