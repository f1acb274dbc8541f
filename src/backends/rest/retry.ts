/**
 * Retry policy for transport calls
 *
 * Bounded attempts with jittered exponential backoff. Only connection-level
 * failures are retried; HTTP status errors and cancellations surface at once.
 */

import { TransportError } from '../../types';
import { systemClock, type Clock } from '../../clock';
import { componentLogger, type Logger } from '../../logger';

export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  /** Upper bound of the random delay added to every backoff */
  jitterMs?: number;
}

export interface RetryDependencies {
  clock?: Clock;
  /** Uniform source in [0, 1) */
  random?: () => number;
  logger?: Logger;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  isRetryable?: (error: unknown) => boolean;
  /** Included in retry log entries */
  label?: string;
}

export const DEFAULT_RETRY_DELAYS = {
  initialDelayMs: 100,
  maxDelayMs: 5000,
  jitterMs: 1000,
} as const;

/** Connection and timeout failures, never HTTP status failures */
export function isRetryableTransportError(error: unknown): boolean {
  return error instanceof TransportError && error.retryable;
}

export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly initialDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly jitterMs: number;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(options: RetryOptions, deps: RetryDependencies = {}) {
    if (!Number.isInteger(options.maxRetries) || options.maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${options.maxRetries}`);
    }
    this.maxAttempts = options.maxRetries + 1;
    this.initialDelayMs = options.initialDelayMs ?? DEFAULT_RETRY_DELAYS.initialDelayMs;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY_DELAYS.maxDelayMs;
    this.jitterMs = options.jitterMs ?? DEFAULT_RETRY_DELAYS.jitterMs;
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? Math.random;
    this.logger = componentLogger('retry', deps.logger);
  }

  /** Backoff before retry number `retryIndex` (0 for the first retry) */
  computeDelay(retryIndex: number): number {
    const exponential = this.initialDelayMs * 2 ** retryIndex;
    return Math.min(this.maxDelayMs, exponential + this.random() * this.jitterMs);
  }

  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    options: ExecuteOptions = {}
  ): Promise<T> {
    const isRetryable = options.isRetryable ?? isRetryableTransportError;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        if (options.signal?.aborted || attempt >= this.maxAttempts || !isRetryable(error)) {
          throw error;
        }

        const delayMs = this.computeDelay(attempt - 1);
        this.logger.warn(
          {
            label: options.label,
            attempt,
            maxAttempts: this.maxAttempts,
            delayMs: Math.round(delayMs),
            err: error,
          },
          'Transient transport failure, retrying'
        );
        await this.clock.sleep(delayMs, options.signal);
      }
    }
  }
}
