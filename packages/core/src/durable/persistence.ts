import { z } from 'zod';
import type { JsonValue } from '../serialization.js';

/** Validates a value read back from storage as a {@link JsonValue}. */
export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

/** Validates a persisted {@link CompensationDescriptor}. */
export const compensationDescriptorSchema = z.object({
  handler: z.string().min(1),
  args: z.array(jsonValueSchema),
});

/**
 * A persisted compensation: the id of a registered handler plus the
 * arguments bound to it.
 */
export interface CompensationDescriptor {
  handler: string;
  args: JsonValue[];
}

/**
 * A descriptor as stored in a ledger, together with its position and
 * whether it has already been compensated.
 */
export interface LedgerEntry extends CompensationDescriptor {
  /** Zero-based position in the saga's ledger (registration order). */
  index: number;
  compensated: boolean;
}

/**
 * Interface for persisting the compensation ledger of durable sagas.
 * Implement this to plug in any storage backend (Redis, database, etc.).
 *
 * @example
 * ```typescript
 * class RedisLedgerStore implements CompensationLedgerStore {
 *   async append(sagaId: string, descriptor: CompensationDescriptor) { ... }
 *   async load(sagaId: string) { ... }
 *   async markCompensated(sagaId: string, index: number) { ... }
 *   async clear(sagaId: string) { ... }
 * }
 * ```
 */
export interface CompensationLedgerStore {
  /**
   * Append a descriptor to the end of the saga's ledger.
   * @returns The zero-based index the descriptor was stored at.
   */
  append(sagaId: string, descriptor: CompensationDescriptor): Promise<number>;

  /**
   * Load every entry of the saga's ledger ordered by index, or an empty
   * array if nothing has been recorded.
   */
  load(sagaId: string): Promise<LedgerEntry[]>;

  /** Record that the entry at `index` has been compensated. */
  markCompensated(sagaId: string, index: number): Promise<void>;

  /** Remove the saga's ledger entirely. */
  clear(sagaId: string): Promise<void>;
}

/**
 * Default in-memory implementation of {@link CompensationLedgerStore}.
 * Suitable for single-process use and testing.
 * State is lost when the process exits.
 */
export class InMemoryLedgerStore implements CompensationLedgerStore {
  private readonly _ledgers = new Map<string, LedgerEntry[]>();

  async append(sagaId: string, descriptor: CompensationDescriptor): Promise<number> {
    const ledger = this._ledgers.get(sagaId) ?? [];
    const index = ledger.length;
    ledger.push({ handler: descriptor.handler, args: cloneArgs(descriptor.args), index, compensated: false });
    this._ledgers.set(sagaId, ledger);
    return index;
  }

  async load(sagaId: string): Promise<LedgerEntry[]> {
    return (this._ledgers.get(sagaId) ?? []).map((entry) => ({
      ...entry,
      args: cloneArgs(entry.args),
    }));
  }

  async markCompensated(sagaId: string, index: number): Promise<void> {
    const entry = this._ledgers.get(sagaId)?.[index];
    if (entry) {
      entry.compensated = true;
    }
  }

  async clear(sagaId: string): Promise<void> {
    this._ledgers.delete(sagaId);
  }
}

// Copies stored args so callers cannot mutate the ledger through a reference.
function cloneArgs(args: JsonValue[]): JsonValue[] {
  return args.map((arg) => structuredClone(arg));
}
