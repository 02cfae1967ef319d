import { ServiceError, errorMessage, toError } from '../../utils/errors';
import { logger } from '../../utils/logger';

const MAX_RETRIES = 3;

export interface ProviderCallOptions {
  service: string;
  operation: string;
  statusOf: (error: unknown) => number | undefined;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Shared retry policy for model providers: 429 and transient failures back
 * off exponentially; 400/401 are not worth repeating.
 */
export async function callProvider<T>(fn: () => Promise<T>, options: ProviderCallOptions): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  let lastError: Error = new Error('no attempts made');

  for (let attempt = 1; attempt <= MAX_RETRIES; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = toError(error);
      const status = options.statusOf(error);

      if (status === 400 || status === 401) {
        throw new ServiceError(options.service, options.operation, lastError, false);
      }

      if (attempt === MAX_RETRIES) break;

      const delay = Math.pow(2, attempt) * (status === 429 ? 1000 : 500);
      if (status === 429) {
        logger.warn(`${options.service} rate limited, backing off`, { attempt, delay });
      } else {
        logger.error(`${options.service} error`, { attempt, status, error: errorMessage(error) });
      }
      await sleep(delay);
    }
  }

  logger.error(`${options.service} failed after retries`, { error: lastError.message });
  throw new ServiceError(options.service, options.operation, lastError, true);
}
