/**
 * Minimal structured logger accepted by {@link Saga}, {@link RetryingExecutor}
 * and {@link DurableSaga}.  Compatible with `console`, pino, winston and most
 * other loggers that take a message followed by a metadata object.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * A deferred unit of reversing work.  Produced by binding a function to its
 * arguments at registration time; invoked at most once during unwind.
 */
export type CompensationAction = () => unknown;

/**
 * Lifecycle of a {@link Saga} instance.
 *
 * - `building`     – accepting `addCompensation()` calls.
 * - `compensating` – `compensate()` is running.
 * - `compensated`  – terminal; the ledger has been consumed.
 */
export type SagaState = 'building' | 'compensating' | 'compensated';

/**
 * A single compensation that failed during unwind.
 */
export interface CompensationFailure {
  /** Zero-based registration index of the failed compensation. */
  readonly index: number;
  /** Name the compensation was registered under. */
  readonly name: string;
  /** The error thrown (or the rejection reason) of the compensation. */
  readonly cause: unknown;
}

/** Called each time a compensation finishes successfully during unwind. */
export type CompensationHook = (index: number, name: string) => void | Promise<void>;
