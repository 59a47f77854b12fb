import { compensationDescriptorSchema } from '@saga-ledger/core';
import type { CompensationDescriptor, CompensationLedgerStore, LedgerEntry } from '@saga-ledger/core';
import type { Redis } from 'ioredis';

/**
 * Options for {@link RedisLedgerStore}.
 */
export interface RedisLedgerStoreOptions {
  /**
   * Optional key prefix applied to every key stored in Redis.
   * Useful for namespacing sagas when the same Redis instance is shared
   * between multiple applications or environments.
   *
   * @default ""
   * @example "myapp:saga:"
   */
  keyPrefix?: string;

  /**
   * Time-to-live in seconds for a saga's keys, refreshed on every write.
   * When omitted, ledgers are stored until {@link RedisLedgerStore.clear}
   * removes them.
   */
  ttlSeconds?: number;
}

/**
 * Redis-backed implementation of {@link CompensationLedgerStore}.
 *
 * Each saga uses two keys:
 * - `<prefix><sagaId>:ledger` – a list of JSON-encoded descriptors, in
 *   registration order;
 * - `<prefix><sagaId>:compensated` – a set of the ledger indices that have
 *   already been compensated.
 *
 * A saga started on one server can therefore be unwound by another after a
 * crash.
 *
 * @example
 * ```typescript
 * import Redis from 'ioredis';
 * import { RedisLedgerStore } from '@saga-ledger/redis-adapter';
 *
 * const redis = new Redis({ host: 'localhost', port: 6379 });
 * const store = new RedisLedgerStore(redis, { keyPrefix: 'saga:', ttlSeconds: 86400 });
 *
 * const saga = new DurableSaga(`order:${orderId}`, registry, store);
 * ```
 */
export class RedisLedgerStore implements CompensationLedgerStore {
  private readonly _redis: Redis;
  private readonly _keyPrefix: string;
  private readonly _ttlSeconds: number | undefined;

  constructor(redis: Redis, options: RedisLedgerStoreOptions = {}) {
    this._redis = redis;
    this._keyPrefix = options.keyPrefix ?? '';
    this._ttlSeconds = options.ttlSeconds;
  }

  /** @internal */
  private _ledgerKey(sagaId: string): string {
    return `${this._keyPrefix}${sagaId}:ledger`;
  }

  /** @internal */
  private _compensatedKey(sagaId: string): string {
    return `${this._keyPrefix}${sagaId}:compensated`;
  }

  /** @internal */
  private async _touch(key: string): Promise<void> {
    if (this._ttlSeconds !== undefined) {
      await this._redis.expire(key, this._ttlSeconds);
    }
  }

  async append(sagaId: string, descriptor: CompensationDescriptor): Promise<number> {
    const key = this._ledgerKey(sagaId);
    const length = await this._redis.rpush(
      key,
      JSON.stringify({ handler: descriptor.handler, args: descriptor.args }),
    );
    await this._touch(key);
    return length - 1;
  }

  async load(sagaId: string): Promise<LedgerEntry[]> {
    const [raw, compensated] = await Promise.all([
      this._redis.lrange(this._ledgerKey(sagaId), 0, -1),
      this._redis.smembers(this._compensatedKey(sagaId)),
    ]);
    const done = new Set(compensated.map(Number));
    return raw.map((value, index) => {
      const descriptor = compensationDescriptorSchema.parse(JSON.parse(value));
      return { ...descriptor, index, compensated: done.has(index) };
    });
  }

  async markCompensated(sagaId: string, index: number): Promise<void> {
    const key = this._compensatedKey(sagaId);
    await this._redis.sadd(key, String(index));
    await this._touch(key);
  }

  async clear(sagaId: string): Promise<void> {
    await this._redis.del(this._ledgerKey(sagaId), this._compensatedKey(sagaId));
  }
}
