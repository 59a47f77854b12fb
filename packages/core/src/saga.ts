import type { CompensationAction, CompensationFailure, CompensationHook, Logger, SagaState } from './types.js';
import type { SagaOptions, ResolvedSagaOptions } from './options.js';
import { resolveSagaOptions } from './options.js';
import type { StepExecutor } from './step-executor.js';
import { DirectExecutor } from './step-executor.js';
import { AggregatedCompensationError, LateRegistrationError, SagaStateError } from './errors.js';

/**
 * Collaborators injected into a {@link Saga}.
 */
export interface SagaDependencies {
  /** Receives lifecycle events; nothing is logged when omitted. */
  logger?: Logger;
  /**
   * Runs forward steps given to {@link Saga.perform} and every compensation.
   * Defaults to a {@link DirectExecutor}.
   */
  executor?: StepExecutor;
}

interface LedgerEntry {
  readonly index: number;
  readonly name: string;
  readonly action: CompensationAction;
}

/**
 * Records compensating actions as a business transaction progresses and
 * unwinds them when the transaction has to be abandoned.
 *
 * Register a compensation only after its forward step has succeeded; the
 * saga trusts that discipline and does not re-verify it.  On failure, call
 * {@link compensate} once:
 *
 * - sequential mode (default) runs compensations in exact reverse
 *   registration order, stopping at the first failure unless
 *   `continueWithError` is set;
 * - parallel mode starts every compensation at once and waits for all of
 *   them to settle.
 *
 * Compensation failures are collected into an
 * {@link AggregatedCompensationError}; forward-step errors are never caught
 * here.
 *
 * @example
 * ```typescript
 * const saga = new Saga({ parallelCompensation: false });
 * try {
 *   const hotelId = await bookHotel(tripId);
 *   saga.addCompensation(cancelHotel, hotelId, tripId);
 *   const flightId = await bookFlight(tripId);
 *   saga.addCompensation(cancelFlight, flightId, tripId);
 * } catch (err) {
 *   await saga.compensate();
 *   throw err;
 * }
 * ```
 */
export class Saga {
  private readonly _options: ResolvedSagaOptions;
  private readonly _logger: Logger | undefined;
  private readonly _executor: StepExecutor;
  private readonly _ledger: LedgerEntry[] = [];
  private readonly _compensationHooks: CompensationHook[] = [];

  private _state: SagaState = 'building';
  private _outcome: Promise<void> | undefined;

  /**
   * @throws {@link InvalidSagaOptionsError} if `options` fail validation.
   */
  constructor(options?: SagaOptions, deps: SagaDependencies = {}) {
    this._options = resolveSagaOptions(options);
    this._logger = deps.logger;
    this._executor = deps.executor ?? new DirectExecutor();
  }

  get state(): SagaState {
    return this._state;
  }

  /** Number of compensations registered so far. */
  get size(): number {
    return this._ledger.length;
  }

  get options(): ResolvedSagaOptions {
    return this._options;
  }

  /**
   * Register a compensation: `fn` is bound to `args` now and invoked only
   * during {@link compensate}.  Registering the same function twice records
   * two compensations.
   *
   * @throws {@link SagaStateError} once `compensate()` has been called.
   */
  addCompensation<TArgs extends unknown[]>(fn: (...args: TArgs) => unknown, ...args: TArgs): this {
    return this._append(fn.name || `compensation-${this._ledger.length}`, fn, args);
  }

  /**
   * Same as {@link addCompensation}, with an explicit name used in log
   * records and in {@link CompensationFailure}.
   */
  addNamedCompensation<TArgs extends unknown[]>(
    name: string,
    fn: (...args: TArgs) => unknown,
    ...args: TArgs
  ): this {
    return this._append(name, fn, args);
  }

  /**
   * Run a forward step through the executor and, only once it succeeds,
   * register `compensate(result)` under the same name.
   *
   * A failing forward step registers nothing and its error propagates
   * unchanged.
   *
   * @throws {@link LateRegistrationError} carrying the step's result when
   *   the step completes after `compensate()` has begun.
   */
  async perform<T>(
    name: string,
    forward: () => T | Promise<T>,
    compensate: (result: T) => unknown,
  ): Promise<T> {
    this._assertBuilding(`perform step "${name}"`);
    const result = await this._executor.execute(name, forward);
    if (this._state !== 'building') {
      this._logger?.warn('compensation:late', { name, state: this._state });
      throw new LateRegistrationError(name, this._state, result);
    }
    this.addNamedCompensation(name, compensate, result);
    return result;
  }

  /**
   * Register a hook called after each compensation succeeds.  A hook that
   * throws marks that compensation as failed.
   * Returns `this` for fluent chaining.
   */
  onCompensation(hook: CompensationHook): this {
    this._compensationHooks.push(hook);
    return this;
  }

  /**
   * Invoke every registered compensation exactly once.
   *
   * Resolves when all of them succeeded (immediately for an empty saga).
   * Calling it again returns the same promise, so no compensation ever runs
   * twice.
   *
   * @throws {@link AggregatedCompensationError} listing the failed
   *   compensations.
   */
  compensate(): Promise<void> {
    if (this._outcome === undefined) {
      this._state = 'compensating';
      // Deferred so the outcome is recorded before any compensation runs.
      this._outcome = Promise.resolve().then(() => this._unwind());
    }
    return this._outcome;
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _append<TArgs extends unknown[]>(
    name: string,
    fn: (...args: TArgs) => unknown,
    args: TArgs,
  ): this {
    this._assertBuilding(`add compensation "${name}"`);
    const index = this._ledger.length;
    this._ledger.push(Object.freeze({ index, name, action: () => fn(...args) }));
    this._logger?.debug('compensation:registered', { index, name });
    return this;
  }

  private _assertBuilding(operation: string): void {
    if (this._state !== 'building') {
      throw new SagaStateError(operation, this._state);
    }
  }

  private async _unwind(): Promise<void> {
    const { parallelCompensation, continueWithError } = this._options;
    const entries = [...this._ledger];
    this._logger?.info('saga:compensate:start', {
      count: entries.length,
      parallel: parallelCompensation,
    });

    let failures: CompensationFailure[];
    try {
      failures = parallelCompensation
        ? await this._unwindParallel(entries)
        : await this._unwindSequential(entries, continueWithError);
    } finally {
      this._state = 'compensated';
    }

    if (failures.length > 0) {
      this._logger?.error('saga:compensate:failed', {
        failed: failures.map((f) => f.index),
      });
      throw new AggregatedCompensationError(failures);
    }
    this._logger?.info('saga:compensate:complete', { count: entries.length });
  }

  private async _unwindSequential(
    entries: readonly LedgerEntry[],
    continueWithError: boolean,
  ): Promise<CompensationFailure[]> {
    const failures: CompensationFailure[] = [];
    for (let i = entries.length - 1; i >= 0; i--) {
      const failure = await this._invoke(entries[i]);
      if (failure) {
        failures.push(failure);
        if (!continueWithError) {
          break;
        }
      }
    }
    return failures;
  }

  private async _unwindParallel(entries: readonly LedgerEntry[]): Promise<CompensationFailure[]> {
    const outcomes = await Promise.all(entries.map((entry) => this._invoke(entry)));
    return outcomes.filter((o): o is CompensationFailure => o !== undefined);
  }

  /** Runs one compensation; resolves with its failure instead of rejecting. */
  private async _invoke(entry: LedgerEntry): Promise<CompensationFailure | undefined> {
    const { index, name } = entry;
    this._logger?.debug('compensation:start', { index, name });
    try {
      await this._executor.execute(name, entry.action);
      for (const hook of this._compensationHooks) {
        await hook(index, name);
      }
    } catch (cause) {
      this._logger?.error('compensation:error', { index, name, error: String(cause) });
      return { index, name, cause };
    }
    this._logger?.info('compensation:complete', { index, name });
    return undefined;
  }
}
