import type { Logger, SagaState } from '../types.js';
import type { SagaOptions } from '../options.js';
import type { SagaDependencies } from '../saga.js';
import { Saga } from '../saga.js';
import { AggregatedCompensationError, InvalidCompensationArgumentsError, SagaStateError } from '../errors.js';
import type { JsonValue } from '../serialization.js';
import { assertJsonArgs } from '../serialization.js';
import type { CompensationHandlerRegistry } from './registry.js';
import type { CompensationLedgerStore } from './persistence.js';

/**
 * A {@link Saga} whose ledger survives process restarts.
 *
 * Every compensation is recorded as a `{ handler, args }` descriptor in a
 * {@link CompensationLedgerStore} before it is registered in memory.  After a
 * crash, {@link DurableSaga.restore} rebuilds the ledger from the store; each
 * compensation that succeeds during unwind is checkpointed, so an unwind
 * interrupted half-way resumes without re-running finished entries.
 *
 * Appends are serialized, so concurrently completing forward steps can
 * register their compensations from parallel branches.
 *
 * @example
 * ```typescript
 * const saga = new DurableSaga(`trip:${tripId}`, registry, new RedisLedgerStore(redis));
 * try {
 *   const hotelId = await bookHotel(tripId);
 *   await saga.addCompensation('cancel-hotel', hotelId, tripId);
 *   await bookFlight(tripId);
 *   await saga.clear();
 * } catch (err) {
 *   await saga.compensate();
 *   throw err;
 * }
 *
 * // in a new process, after a crash:
 * const restored = await DurableSaga.restore(`trip:${tripId}`, registry, store);
 * await restored.compensate();
 * ```
 */
export class DurableSaga {
  private readonly _sagaId: string;
  private readonly _registry: CompensationHandlerRegistry;
  private readonly _store: CompensationLedgerStore;
  private readonly _logger: Logger | undefined;
  private readonly _saga: Saga;
  /** Ledger index in the store for each in-memory registration index. */
  private readonly _storeIndices: number[] = [];

  private _appendTail: Promise<unknown> = Promise.resolve();
  private _outcome: Promise<void> | undefined;

  constructor(
    sagaId: string,
    registry: CompensationHandlerRegistry,
    store: CompensationLedgerStore,
    options?: SagaOptions,
    deps: SagaDependencies = {},
  ) {
    this._sagaId = sagaId;
    this._registry = registry;
    this._store = store;
    this._logger = deps.logger;
    this._saga = new Saga(options, deps).onCompensation((index) =>
      this._store.markCompensated(this._sagaId, this._storeIndexOf(index)),
    );
  }

  /**
   * Rebuild a saga from its persisted ledger.  Entries already marked as
   * compensated are skipped.
   *
   * @throws {@link UnknownCompensationHandlerError} if the ledger references
   *   a handler id missing from `registry`.
   */
  static async restore(
    sagaId: string,
    registry: CompensationHandlerRegistry,
    store: CompensationLedgerStore,
    options?: SagaOptions,
    deps: SagaDependencies = {},
  ): Promise<DurableSaga> {
    const saga = new DurableSaga(sagaId, registry, store, options, deps);
    const entries = await store.load(sagaId);
    const pending = entries
      .filter((entry) => !entry.compensated)
      .sort((a, b) => a.index - b.index);
    for (const entry of pending) {
      saga._register(entry.handler, entry.index, entry.args);
    }
    saga._logger?.info('ledger:restore', {
      sagaId,
      entries: entries.length,
      pending: pending.length,
    });
    return saga;
  }

  get sagaId(): string {
    return this._sagaId;
  }

  get state(): SagaState {
    return this._saga.state;
  }

  /** Number of compensations waiting in memory to be run. */
  get size(): number {
    return this._saga.size;
  }

  /**
   * Persist a compensation descriptor and register it for unwind.
   *
   * @throws {@link UnknownCompensationHandlerError} if `handler` is not registered.
   * @throws {@link SerializationError} if any argument is not plain JSON data.
   * @throws {@link InvalidCompensationArgumentsError} if the arguments do not
   *   match the handler's schema.
   * @throws {@link SagaStateError} once `compensate()` has been called.
   */
  addCompensation(handler: string, ...args: unknown[]): Promise<void> {
    const appended = this._appendTail.then(() => this._append(handler, args));
    // Keeps the queue alive; the failure itself reaches the caller through `appended`.
    this._appendTail = appended.catch(() => undefined);
    return appended;
  }

  /**
   * Run every pending compensation with the semantics of
   * {@link Saga.compensate}, after any in-flight `addCompensation()` calls
   * have been persisted.  Failure indices refer to ledger positions.
   *
   * Calling it again returns the same promise.
   */
  compensate(): Promise<void> {
    if (this._outcome === undefined) {
      this._outcome = this._appendTail
        .then(() => this._saga.compensate())
        .catch((err: unknown) => {
          if (err instanceof AggregatedCompensationError) {
            throw new AggregatedCompensationError(
              err.failures.map((f) => ({ ...f, index: this._storeIndexOf(f.index) })),
              err.cause,
            );
          }
          throw err;
        });
    }
    return this._outcome;
  }

  /**
   * Delete the persisted ledger, e.g. once the business transaction has
   * committed or after a clean unwind.  Waits for a running `compensate()`
   * to settle first.
   */
  async clear(): Promise<void> {
    await this._appendTail;
    // Let a running unwind finish checkpointing; its failure belongs to the
    // caller of compensate().
    await this._outcome?.then(
      () => undefined,
      () => undefined,
    );
    await this._store.clear(this._sagaId);
    this._logger?.debug('ledger:clear', { sagaId: this._sagaId });
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _append(handler: string, args: unknown[]): Promise<void> {
    if (this._saga.state !== 'building') {
      throw new SagaStateError(`add compensation "${handler}"`, this._saga.state);
    }
    const registered = this._registry.resolve(handler);
    assertJsonArgs(args, handler);
    const issues = registered.check(args);
    if (issues.length > 0) {
      throw new InvalidCompensationArgumentsError(handler, issues);
    }
    const index = await this._store.append(this._sagaId, { handler, args });
    this._logger?.debug('ledger:append', { sagaId: this._sagaId, handler, index });
    this._register(handler, index, args);
  }

  private _register(handler: string, storeIndex: number, args: JsonValue[]): void {
    const registered = this._registry.resolve(handler);
    this._saga.addNamedCompensation(handler, (bound: JsonValue[]) => registered.invoke(bound), args);
    this._storeIndices.push(storeIndex);
  }

  private _storeIndexOf(index: number): number {
    return this._storeIndices[index] ?? index;
  }
}
