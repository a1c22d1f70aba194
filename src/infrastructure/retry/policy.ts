// ═══════════════════════════════════════════════════════════════════════════════
// RETRY POLICY — Retry Result-Returning Operations with Backoff
// ═══════════════════════════════════════════════════════════════════════════════
//
// Operations report failure as Err values rather than throwing, so retry
// decisions are made on the error value. A thrown exception is a programming
// error and propagates on the first attempt.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Result } from '../../types/result.js';
import { getLogger } from '../../observability/logging/index.js';
import { DEFAULT_RETRY_CONFIG, type RetryConfig } from './types.js';
import { createBackoffCalculator, sleep as defaultSleep, formatDelay } from './backoff.js';

const logger = getLogger({ component: 'retry' });

/**
 * Run `operation` until it returns Ok, the error is not retryable, or
 * `maxAttempts` retries have been spent. Returns the last result.
 */
export async function retryResult<T, E>(
  operation: (attempt: number) => Promise<Result<T, E>>,
  config: Partial<RetryConfig<E>> = {}
): Promise<Result<T, E>> {
  const { isRetryable, onRetry, sleep = defaultSleep, ...rest } = config;
  const settings = { ...DEFAULT_RETRY_CONFIG, ...rest };
  const backoff = createBackoffCalculator(settings);
  const startTime = Date.now();

  let attempt = 1;
  for (;;) {
    const result = await operation(attempt);
    if (result.ok) {
      if (attempt > 1) {
        logger.debug('Retry succeeded', { attempt, totalTimeMs: Date.now() - startTime });
      }
      return result;
    }

    const retryable = isRetryable ? isRetryable(result.error, attempt) : true;
    if (!retryable || attempt > settings.maxAttempts) {
      if (retryable) {
        logger.warn('Retry exhausted', { attempts: attempt, error: result.error });
      }
      return result;
    }

    const delayMs = backoff.calculate(attempt);
    logger.debug('Retrying', {
      attempt,
      maxAttempts: settings.maxAttempts,
      delay: formatDelay(delayMs),
    });
    onRetry?.({
      attempt,
      maxAttempts: settings.maxAttempts,
      error: result.error,
      delayMs,
      elapsedMs: Date.now() - startTime,
    });

    await sleep(delayMs);
    attempt++;
  }
}
