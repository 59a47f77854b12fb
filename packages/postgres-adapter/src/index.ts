import { compensationDescriptorSchema } from '@saga-ledger/core';
import type { CompensationDescriptor, CompensationLedgerStore, JsonValue, LedgerEntry } from '@saga-ledger/core';
import { pgTable, text, integer, jsonb, boolean, primaryKey } from 'drizzle-orm/pg-core';
import { and, asc, eq, max } from 'drizzle-orm';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';

// ---------------------------------------------------------------------------
// Drizzle schema
// ---------------------------------------------------------------------------

/**
 * Drizzle table definition for durable saga ledgers.
 * Export this if you need to include it in your own Drizzle schema object
 * (e.g. to run `drizzle-kit push` or `drizzle-kit generate`).
 *
 * @example
 * ```typescript
 * import { sagaCompensations } from '@saga-ledger/postgres-adapter';
 * // Include in your schema for migrations:
 * export { sagaCompensations };
 * ```
 */
export const sagaCompensations = pgTable(
  'saga_compensations',
  {
    sagaId: text('saga_id').notNull(),
    /** Position in the saga's ledger (registration order). */
    idx: integer('idx').notNull(),
    /** Id of the registered compensation handler. */
    handler: text('handler').notNull(),
    /** Arguments bound to the handler. */
    args: jsonb('args').$type<JsonValue[]>().notNull(),
    compensated: boolean('compensated').notNull().default(false),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.sagaId, table.idx] }),
  }),
);

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

/**
 * PostgreSQL-backed implementation of {@link CompensationLedgerStore},
 * powered by Drizzle ORM.
 *
 * Persists each recorded compensation as a row in the `saga_compensations`
 * table, giving an auditable record of what a failed transaction had to
 * undo and which of those undo actions actually completed.
 *
 * ### Setup
 *
 * 1. Add `sagaCompensations` to your Drizzle schema and run `drizzle-kit push`
 *    (or generate + apply a migration) to create the table.
 * 2. Pass your Drizzle `db` instance to `PostgresLedgerStore`.
 *
 * @example
 * ```typescript
 * import { drizzle } from 'drizzle-orm/node-postgres';
 * import { Pool } from 'pg';
 * import { PostgresLedgerStore } from '@saga-ledger/postgres-adapter';
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const store = new PostgresLedgerStore(drizzle(pool));
 * const saga = new DurableSaga(`order:${orderId}`, registry, store);
 * ```
 */
export class PostgresLedgerStore implements CompensationLedgerStore {
  private readonly _db: NodePgDatabase;

  constructor(db: NodePgDatabase) {
    this._db = db;
  }

  async append(sagaId: string, descriptor: CompensationDescriptor): Promise<number> {
    const [last] = await this._db
      .select({ idx: max(sagaCompensations.idx) })
      .from(sagaCompensations)
      .where(eq(sagaCompensations.sagaId, sagaId));

    const idx = last?.idx == null ? 0 : last.idx + 1;
    await this._db.insert(sagaCompensations).values({
      sagaId,
      idx,
      handler: descriptor.handler,
      args: descriptor.args,
    });
    return idx;
  }

  async load(sagaId: string): Promise<LedgerEntry[]> {
    const rows = await this._db
      .select()
      .from(sagaCompensations)
      .where(eq(sagaCompensations.sagaId, sagaId))
      .orderBy(asc(sagaCompensations.idx));

    // jsonb is typed, not checked; validate like any other stored descriptor.
    return rows.map((row) => ({
      ...compensationDescriptorSchema.parse({ handler: row.handler, args: row.args }),
      index: row.idx,
      compensated: row.compensated,
    }));
  }

  async markCompensated(sagaId: string, index: number): Promise<void> {
    await this._db
      .update(sagaCompensations)
      .set({ compensated: true })
      .where(and(eq(sagaCompensations.sagaId, sagaId), eq(sagaCompensations.idx, index)));
  }

  async clear(sagaId: string): Promise<void> {
    await this._db.delete(sagaCompensations).where(eq(sagaCompensations.sagaId, sagaId));
  }
}
