/**
 * @fileoverview Retry wrapper for upstream REST calls.
 *
 * Retries transient network failures and retryable HTTP statuses with a
 * fixed backoff schedule. Non-retryable responses are returned as-is so the
 * caller can turn them into an UpstreamError.
 */

import { createLogger } from '../../utils/observability/index.js';

const logger = createLogger({ domain: 'http' });

/** Retryable network error codes commonly surfaced by undici/fetch. */
const RETRYABLE_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

/** Retryable HTTP statuses for transient upstream issues. */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

/**
 * Extract network error code from a fetch error's cause when available.
 */
function getErrorCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  const cause: unknown = error.cause;
  if (typeof cause !== 'object' || cause === null || !('code' in cause)) {
    return undefined;
  }
  return typeof cause.code === 'string' ? cause.code : undefined;
}

function isRetryableFetchError(error: unknown): boolean {
  if (!(error instanceof TypeError)) return false;

  const code = getErrorCode(error);
  if (code && RETRYABLE_ERROR_CODES.has(code)) return true;

  const message = error.message.toLowerCase();
  return message.includes('fetch failed') || message.includes('network');
}

function delayMs(attempt: number, retryDelaysMs: number[]): number {
  return retryDelaysMs[Math.min(attempt - 1, retryDelaysMs.length - 1)] ?? 0;
}

async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Fetch with retries for transient failures.
 *
 * @param operation Label for logs (e.g. "cal.listBookings")
 * @param retryDelaysMs Delays between retries in milliseconds (attempts = delays + 1)
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  operation: string,
  retryDelaysMs: number[] = [250, 750]
): Promise<Response> {
  const totalAttempts = retryDelaysMs.length + 1;

  for (let attempt = 1; attempt <= totalAttempts; attempt++) {
    try {
      const response = await fetch(url, init);
      if (response.ok) return response;

      const canRetry = attempt < totalAttempts && isRetryableStatus(response.status);
      if (!canRetry) return response;

      const waitMs = delayMs(attempt, retryDelaysMs);
      logger.warn('upstream_retryable_status', {
        operation,
        status: response.status,
        attempt,
        totalAttempts,
        retryInMs: waitMs,
      });
      await sleep(waitMs);
    } catch (error) {
      const canRetry = attempt < totalAttempts && isRetryableFetchError(error);
      if (!canRetry) throw error;

      const waitMs = delayMs(attempt, retryDelaysMs);
      logger.warn('upstream_network_error', {
        operation,
        error: error instanceof Error ? error.message : String(error),
        errorCode: getErrorCode(error),
        attempt,
        totalAttempts,
        retryInMs: waitMs,
      });
      await sleep(waitMs);
    }
  }

  throw new Error(`${operation} failed after retries`);
}
