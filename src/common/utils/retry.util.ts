import { Logger } from '@nestjs/common';
import { UpstreamUnavailableError } from '../errors';
import { errorMessage } from './error.util';

export interface RetryOptions {
  /** Name reported in logs and in the final error. */
  source: string;
  /** Retries after the first attempt. */
  maxRetries: number;
  /** Delay before the first retry; doubles on every further retry. */
  baseDelayMs: number;
  maxDelayMs?: number;
  logger?: Logger;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

export function backoffDelay(retry: number, baseDelayMs: number, maxDelayMs?: number): number {
  const delay = baseDelayMs * 2 ** (retry - 1);
  return maxDelayMs === undefined ? delay : Math.min(delay, maxDelayMs);
}

/**
 * Runs `operation` with bounded exponential backoff. Once retries are spent the
 * last failure is wrapped in an {@link UpstreamUnavailableError}.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(0, options.maxRetries) + 1;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt === attempts) {
        break;
      }
      const delay = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      options.logger?.warn(
        `${options.source} attempt ${attempt}/${attempts} failed: ${errorMessage(error)}; retrying in ${delay}ms`,
      );
      await sleep(delay);
    }
  }

  throw new UpstreamUnavailableError(options.source, attempts, errorMessage(lastError));
}
