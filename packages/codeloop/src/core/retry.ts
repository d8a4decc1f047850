/**
 * Retry configuration for model transport calls.
 *
 * Transport failures never abort a task: by default the call is retried forever
 * with capped exponential backoff (5s, 10s, 20s, 30s, 30s, ...).
 */

import pRetry from "p-retry";
import type { ILogObj, Logger } from "tslog";
import {
  DEFAULT_RETRY_FACTOR,
  DEFAULT_RETRY_MAX_TIMEOUT_MS,
  DEFAULT_RETRY_MIN_TIMEOUT_MS,
} from "./constants.js";
import { TransportError } from "./errors.js";

/**
 * Configuration options for retry behavior.
 *
 * @example
 * ```typescript
 * const agent = new Agent({
 *   transport,
 *   registry,
 *   retry: { minTimeout: 1000, onRetry: (error, attempt) => console.log(attempt) },
 * });
 * ```
 */
export interface RetryConfig {
  /**
   * Whether retry is enabled.
   * @default true
   */
  enabled?: boolean;

  /**
   * Maximum number of retry attempts.
   * @default Infinity
   */
  retries?: number;

  /**
   * Delay before the first retry in milliseconds.
   * @default 5000
   */
  minTimeout?: number;

  /**
   * Maximum delay between retries in milliseconds.
   * @default 30000
   */
  maxTimeout?: number;

  /**
   * Exponential factor for backoff calculation.
   * @default 2
   */
  factor?: number;

  /**
   * Whether to add random jitter to the delays.
   * @default false
   */
  randomize?: boolean;

  /** Called before each retry attempt. */
  onRetry?: (error: Error, attempt: number) => void;

  /**
   * Custom classification of retryable errors.
   * Without it every transport error is retried.
   */
  shouldRetry?: (error: Error) => boolean;
}

export interface ResolvedRetryConfig {
  enabled: boolean;
  retries: number;
  minTimeout: number;
  maxTimeout: number;
  factor: number;
  randomize: boolean;
  onRetry?: (error: Error, attempt: number) => void;
  shouldRetry?: (error: Error) => boolean;
}

export const DEFAULT_RETRY_CONFIG: Omit<ResolvedRetryConfig, "onRetry" | "shouldRetry"> = {
  enabled: true,
  retries: Number.POSITIVE_INFINITY,
  minTimeout: DEFAULT_RETRY_MIN_TIMEOUT_MS,
  maxTimeout: DEFAULT_RETRY_MAX_TIMEOUT_MS,
  factor: DEFAULT_RETRY_FACTOR,
  randomize: false,
};

/**
 * Resolves a partial retry configuration by applying defaults.
 */
export function resolveRetryConfig(config?: RetryConfig): ResolvedRetryConfig {
  if (!config) {
    return { ...DEFAULT_RETRY_CONFIG };
  }

  return {
    enabled: config.enabled ?? DEFAULT_RETRY_CONFIG.enabled,
    retries: config.retries ?? DEFAULT_RETRY_CONFIG.retries,
    minTimeout: config.minTimeout ?? DEFAULT_RETRY_CONFIG.minTimeout,
    maxTimeout: config.maxTimeout ?? DEFAULT_RETRY_CONFIG.maxTimeout,
    factor: config.factor ?? DEFAULT_RETRY_CONFIG.factor,
    randomize: config.randomize ?? DEFAULT_RETRY_CONFIG.randomize,
    onRetry: config.onRetry,
    shouldRetry: config.shouldRetry,
  };
}

/**
 * Computes the delay before the given retry attempt (1-based) without jitter.
 *
 * @example
 * ```typescript
 * computeBackoffDelay(1, resolveRetryConfig()); // 5000
 * computeBackoffDelay(4, resolveRetryConfig()); // 30000 (capped)
 * ```
 */
export function computeBackoffDelay(attempt: number, config: ResolvedRetryConfig): number {
  const delay = config.minTimeout * config.factor ** Math.max(0, attempt - 1);
  return Math.min(delay, config.maxTimeout);
}

/**
 * Runs a model transport call, converting every failure to a {@link TransportError}
 * and retrying it with exponential backoff.
 */
export async function withTransportRetry<T>(
  operation: () => Promise<T>,
  config: ResolvedRetryConfig,
  logger?: Logger<ILogObj>,
): Promise<T> {
  const attempt = async (): Promise<T> => {
    try {
      return await operation();
    } catch (error) {
      throw error instanceof TransportError ? error : new TransportError(error);
    }
  };

  if (!config.enabled) {
    return attempt();
  }

  const { retries, minTimeout, maxTimeout, factor, randomize, onRetry, shouldRetry } = config;

  return pRetry(attempt, {
    retries,
    minTimeout,
    maxTimeout,
    factor,
    randomize,
    onFailedAttempt: (context) => {
      const { error, attemptNumber } = context;
      logger?.warn(
        `Model call failed (attempt ${attemptNumber}), retrying in ${computeBackoffDelay(attemptNumber, config)}ms`,
        { error: error.message },
      );
      onRetry?.(error, attemptNumber);
    },
    shouldRetry: (context) => (shouldRetry ? shouldRetry(context.error) : true),
  });
}
