/**
 * Request utilities for throttling and retry logic
 */

import { isAxiosError } from 'axios';
import { HTTP_STATUS } from '../constants';
import Logger, { getErrorMessage } from '../logger';

/**
 * Retry configuration
 */
const RETRY = {
  RETRY_DELAY_BASE: 1000, // Base delay for exponential backoff (1 second)
  MAX_RETRIES: 3,
  BACKOFF_MULTIPLIER: 2
};

export interface RetryOptions {
  maxRetries?: number;
  logPrefix?: string;
  /** Override the wait between attempts (tests pass a no-op) */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Sleep for specified milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Calculate exponential backoff delay
 */
export function getBackoffDelay(attempt: number): number {
  return RETRY.RETRY_DELAY_BASE * RETRY.BACKOFF_MULTIPLIER ** attempt;
}

/**
 * Check if error indicates an expired or rejected token (401/403)
 */
export function isAuthError(error: unknown): boolean {
  if (isAxiosError(error) && error.response) {
    const status = error.response.status;
    return status === HTTP_STATUS.UNAUTHORIZED || status === HTTP_STATUS.FORBIDDEN;
  }
  return false;
}

/**
 * Check if error is worth retrying: throttling (429), server errors, or no response at all
 */
export function isTransient(error: unknown): boolean {
  if (!isAxiosError(error)) return false;
  if (!error.response) return true;
  const status = error.response.status;
  return status === HTTP_STATUS.TOO_MANY_REQUESTS || status >= 500;
}

/** Retry-After header (seconds) on a throttled response, in ms */
function retryAfterMs(error: unknown): number | null {
  if (!isAxiosError(error) || !error.response) return null;
  const header = error.response.headers?.['retry-after'];
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : null;
}

/**
 * Execute request, retrying transient failures with exponential backoff.
 * Non-transient errors and the last failed attempt are thrown.
 */
export async function requestWithRetry<T>(requestFn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? RETRY.MAX_RETRIES;
  const logPrefix = options.logPrefix ?? 'Request';
  const wait = options.sleep ?? sleep;

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await requestFn();
      if (attempt > 0) Logger.info(`${logPrefix}: Retry successful on attempt ${attempt + 1}`);
      return result;
    } catch (error) {
      const isLastAttempt = attempt >= maxRetries - 1;
      if (!isTransient(error) || isLastAttempt) {
        if (isLastAttempt && isTransient(error)) Logger.error(`${logPrefix}: Failed after ${maxRetries} attempts:`, getErrorMessage(error));
        throw error;
      }
      const delay = retryAfterMs(error) ?? getBackoffDelay(attempt);
      Logger.warn(`${logPrefix}: Request failed (attempt ${attempt + 1}/${maxRetries}), retrying in ${delay}ms:`, getErrorMessage(error));
      await wait(delay);
    }
  }
}
