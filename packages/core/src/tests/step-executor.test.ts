import { describe, it, expect, vi } from 'vitest';
import { DirectExecutor, RetryingExecutor } from '../step-executor.js';
import { InvalidSagaOptionsError, RetryExhaustedError } from '../errors.js';
import type { Logger } from '../types.js';

class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

const noSleep = async (): Promise<void> => undefined;

// ---------------------------------------------------------------------------
// DirectExecutor
// ---------------------------------------------------------------------------

describe('DirectExecutor', () => {
  it('returns the value produced by the work', async () => {
    await expect(new DirectExecutor().execute('step', () => 42)).resolves.toBe(42);
  });

  it('awaits asynchronous work', async () => {
    await expect(new DirectExecutor().execute('step', async () => 'done')).resolves.toBe('done');
  });

  it('runs the work exactly once and propagates its error unchanged', async () => {
    const failure = new Error('boom');
    const work = vi.fn(() => {
      throw failure;
    });

    await expect(new DirectExecutor().execute('step', work)).rejects.toBe(failure);
    expect(work).toHaveBeenCalledTimes(1);
  });
});

// ---------------------------------------------------------------------------
// RetryingExecutor
// ---------------------------------------------------------------------------

describe('RetryingExecutor', () => {
  it('applies the default policy', () => {
    expect(new RetryingExecutor().policy).toEqual({
      maximumAttempts: 3,
      initialIntervalMs: 100,
      backoffCoefficient: 2,
      maximumIntervalMs: 10_000,
      nonRetryableErrors: [],
    });
  });

  it('returns as soon as an attempt succeeds', async () => {
    const sleep = vi.fn(noSleep);
    let attempts = 0;
    const work = vi.fn(async () => {
      attempts++;
      if (attempts < 3) throw new Error(`attempt ${attempts}`);
      return 'charged';
    });

    const executor = new RetryingExecutor({ maximumAttempts: 5 }, { sleep });
    await expect(executor.execute('charge', work)).resolves.toBe('charged');
    expect(work).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('throws RetryExhaustedError carrying the last error once every attempt failed', async () => {
    let attempts = 0;
    const work = vi.fn(async () => {
      attempts++;
      throw new Error(`boom ${attempts}`);
    });

    const executor = new RetryingExecutor({ maximumAttempts: 2 }, { sleep: noSleep });
    const err = await executor.execute('charge', work).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RetryExhaustedError);
    expect(err).toMatchObject({ stepName: 'charge', attempts: 2 });
    expect((err as RetryExhaustedError).cause).toEqual(new Error('boom 2'));
    expect((err as Error).message).toBe(
      'RetryExhaustedError: step "charge" failed after 2 attempt(s): boom 2',
    );
    expect(work).toHaveBeenCalledTimes(2);
  });

  it('rethrows a non-retryable error immediately', async () => {
    const failure = new ValidationError('card number invalid');
    const work = vi.fn(async () => {
      throw failure;
    });

    const executor = new RetryingExecutor(
      { maximumAttempts: 5, nonRetryableErrors: ['ValidationError'] },
      { sleep: noSleep },
    );
    await expect(executor.execute('charge', work)).rejects.toBe(failure);
    expect(work).toHaveBeenCalledTimes(1);
  });

  it('makes a single attempt when maximumAttempts is 1', async () => {
    const work = vi.fn(async () => {
      throw new Error('down');
    });

    const executor = new RetryingExecutor({ maximumAttempts: 1 }, { sleep: noSleep });
    await expect(executor.execute('charge', work)).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(work).toHaveBeenCalledTimes(1);
  });

  it('grows the delay exponentially up to maximumIntervalMs', () => {
    const executor = new RetryingExecutor({
      initialIntervalMs: 1000,
      backoffCoefficient: 3,
      maximumIntervalMs: 5000,
    });

    expect(executor.delayBefore(1)).toBe(0);
    expect(executor.delayBefore(2)).toBe(1000);
    expect(executor.delayBefore(3)).toBe(3000);
    expect(executor.delayBefore(4)).toBe(5000);
  });

  it('logs a warning before each retry', async () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    let attempts = 0;
    const work = async () => {
      attempts++;
      if (attempts === 1) throw new Error('first');
      return attempts;
    };

    await new RetryingExecutor({}, { logger, sleep: noSleep }).execute('ship', work);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('step:retry', {
      stepName: 'ship',
      attempt: 2,
      delayMs: 100,
    });
  });

  it('rejects an invalid policy', () => {
    expect(() => new RetryingExecutor({ maximumAttempts: 0 })).toThrowError(InvalidSagaOptionsError);
    expect(
      () => new RetryingExecutor({ initialIntervalMs: 500, maximumIntervalMs: 100 }),
    ).toThrowError(
      'RetryPolicy: invalid configuration (maximumIntervalMs: maximumIntervalMs must not be smaller than initialIntervalMs).',
    );
  });
});
