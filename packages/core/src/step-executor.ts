import type { Logger } from './types.js';
import type { RetryPolicy, ResolvedRetryPolicy } from './options.js';
import { resolveRetryPolicy } from './options.js';
import { RetryExhaustedError } from './errors.js';

/**
 * Runs a unit of work on behalf of a saga: forward steps passed to
 * {@link Saga.perform} and every compensation during unwind.
 *
 * Implement this to route work through a durable engine, a job queue or a
 * tracing layer.  Retries, timeouts and at-least-once delivery belong here,
 * never in the coordinator.
 */
export interface StepExecutor {
  execute<T>(name: string, work: () => T | Promise<T>): Promise<T>;
}

/**
 * Runs work exactly once in the caller's context.  The default executor.
 */
export class DirectExecutor implements StepExecutor {
  async execute<T>(_name: string, work: () => T | Promise<T>): Promise<T> {
    return work();
  }
}

/** Resolves after `ms` milliseconds. */
export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Options accepted by {@link RetryingExecutor}.
 */
export interface RetryingExecutorOptions {
  logger?: Logger;
  /** Replaces the real timer, e.g. to avoid waiting in tests. */
  sleep?: Sleep;
}

/**
 * Retries failing work with exponential backoff.
 *
 * The delay before attempt `n` (n ≥ 2) is
 * `min(initialIntervalMs * backoffCoefficient^(n - 2), maximumIntervalMs)`.
 * Errors whose `name` is listed in `nonRetryableErrors` are rethrown
 * unchanged on the first occurrence; once every attempt has failed a
 * {@link RetryExhaustedError} carrying the last error is thrown.
 *
 * @example
 * ```typescript
 * const executor = new RetryingExecutor({ maximumAttempts: 5, initialIntervalMs: 200 });
 * const saga = new Saga({}, { executor });
 * ```
 */
export class RetryingExecutor implements StepExecutor {
  private readonly _policy: ResolvedRetryPolicy;
  private readonly _logger: Logger | undefined;
  private readonly _sleep: Sleep;

  constructor(policy: RetryPolicy = {}, options: RetryingExecutorOptions = {}) {
    this._policy = resolveRetryPolicy(policy);
    this._logger = options.logger;
    this._sleep = options.sleep ?? defaultSleep;
  }

  get policy(): ResolvedRetryPolicy {
    return this._policy;
  }

  /** Backoff delay in milliseconds before the given (1-based) attempt. */
  delayBefore(attempt: number): number {
    if (attempt <= 1) return 0;
    const { initialIntervalMs, backoffCoefficient, maximumIntervalMs } = this._policy;
    return Math.min(initialIntervalMs * Math.pow(backoffCoefficient, attempt - 2), maximumIntervalMs);
  }

  async execute<T>(name: string, work: () => T | Promise<T>): Promise<T> {
    const { maximumAttempts, nonRetryableErrors } = this._policy;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maximumAttempts; attempt++) {
      if (attempt > 1) {
        const delayMs = this.delayBefore(attempt);
        this._logger?.warn('step:retry', { stepName: name, attempt, delayMs });
        await this._sleep(delayMs);
      }
      try {
        return await work();
      } catch (err) {
        if (err instanceof Error && nonRetryableErrors.includes(err.name)) {
          throw err;
        }
        lastError = err;
      }
    }

    throw new RetryExhaustedError(name, maximumAttempts, lastError);
  }
}
