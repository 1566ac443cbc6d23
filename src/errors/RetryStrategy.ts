/**
 * Retries for provider HTTP calls.
 *
 * Only ApplicationErrors flagged `retryable` are retried; when a policy
 * names `retryableErrorCodes`, the code must also be on that list. A
 * RateLimitError's `retryAfter` replaces the computed backoff delay.
 */

import type { Logger } from 'winston';
import { TIME } from '../config/constants.js';
import { ApplicationError, ErrorCode } from './ApplicationError.js';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  /** 2 doubles the delay after every failed attempt */
  backoffMultiplier: number;
  /** 0..1, share of the delay randomized around its value */
  jitterFactor: number;
  retryableErrorCodes?: ErrorCode[];
}

export type RetryResult<T> =
  | { success: true; value: T; attemptCount: number; totalDelayMs: number }
  | { success: false; error: Error; attemptCount: number; totalDelayMs: number };

export const NETWORK_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  initialDelayMs: 2000,
  maxDelayMs: 60000,
  backoffMultiplier: 2,
  jitterFactor: 0.3,
  retryableErrorCodes: [
    ErrorCode.NETWORK_CONNECTION_FAILED,
    ErrorCode.NETWORK_TIMEOUT,
    ErrorCode.PROVIDER_RATE_LIMIT,
    ErrorCode.PROVIDER_SERVER_ERROR,
  ],
};

export class RetryStrategy {
  constructor(
    private readonly logger: Logger,
    private readonly policy: RetryPolicy
  ) {}

  /**
   * Run `operation`, re-throwing the last error once retries are spent
   */
  async execute<T>(operation: () => Promise<T>, operationName = 'operation'): Promise<T> {
    const result = await this.executeWithResult(operation, operationName);
    if (!result.success) {
      throw result.error;
    }
    return result.value;
  }

  async executeWithResult<T>(
    operation: () => Promise<T>,
    operationName = 'operation'
  ): Promise<RetryResult<T>> {
    let totalDelayMs = 0;

    for (let attempt = 1; ; attempt++) {
      try {
        const value = await operation();
        return { success: true, value, attemptCount: attempt, totalDelayMs };
      } catch (caught) {
        const error = caught instanceof Error ? caught : new Error(String(caught));

        if (attempt >= this.policy.maxAttempts || !this.isRetryable(error)) {
          this.logger.warn(`${operationName} failed after ${attempt} attempt(s)`, {
            error: error.message,
            totalDelayMs,
          });
          return { success: false, error, attemptCount: attempt, totalDelayMs };
        }

        const delayMs = extractRetryAfter(error) ?? this.backoff(attempt);
        totalDelayMs += delayMs;
        this.logger.info(`Retrying ${operationName} after error`, {
          error: error.message,
          attempt,
          nextAttemptInMs: delayMs,
        });
        await new Promise(resolve => setTimeout(resolve, delayMs));
      }
    }
  }

  private isRetryable(error: Error): boolean {
    if (!(error instanceof ApplicationError) || !error.retryable) {
      return false;
    }
    return this.policy.retryableErrorCodes?.includes(error.code) ?? true;
  }

  private backoff(attempt: number): number {
    const base = Math.min(
      this.policy.initialDelayMs * this.policy.backoffMultiplier ** (attempt - 1),
      this.policy.maxDelayMs
    );
    const jitter = base * this.policy.jitterFactor * (Math.random() - 0.5);
    return Math.max(0, Math.floor(base + jitter));
  }
}

/**
 * Delay requested by a rate-limited provider, in milliseconds
 */
export function extractRetryAfter(error: Error): number | undefined {
  if (!(error instanceof ApplicationError)) {
    return undefined;
  }
  const retryAfter = error.context.metadata?.retryAfter;
  return typeof retryAfter === 'number' ? retryAfter * TIME.ONE_SECOND : undefined;
}
