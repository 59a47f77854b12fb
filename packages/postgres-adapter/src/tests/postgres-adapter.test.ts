import { describe, it, expect, vi } from 'vitest';
import { getTableName } from 'drizzle-orm';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { PostgresLedgerStore, sagaCompensations } from '../index.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Build a minimal Drizzle db mock covering the query chains used by
 * PostgresLedgerStore.  `selectRows` is what every select resolves to.
 */
function makeDbMock(selectRows: Record<string, unknown>[] = []) {
  const orderBy = vi.fn(async () => selectRows);
  // A select either ends at where() (max index) or continues to orderBy() (load).
  const selectWhere = vi.fn(() => Object.assign(Promise.resolve(selectRows), { orderBy }));
  const from = vi.fn(() => ({ where: selectWhere }));
  const select = vi.fn(() => ({ from }));

  const values = vi.fn(async () => undefined);
  const insert = vi.fn(() => ({ values }));

  const updateWhere = vi.fn(async () => undefined);
  const set = vi.fn(() => ({ where: updateWhere }));
  const update = vi.fn(() => ({ set }));

  const deleteWhere = vi.fn(async () => undefined);
  const del = vi.fn(() => ({ where: deleteWhere }));

  const db = { select, insert, update, delete: del } as unknown as NodePgDatabase;
  return { db, select, from, orderBy, insert, values, update, set, updateWhere, del, deleteWhere };
}

// ---------------------------------------------------------------------------
// PostgresLedgerStore
// ---------------------------------------------------------------------------

describe('PostgresLedgerStore', () => {
  it('inserts the first entry of a saga at index 0', async () => {
    const mock = makeDbMock([{ idx: null }]);
    const store = new PostgresLedgerStore(mock.db);

    const index = await store.append('trip-1', { handler: 'cancel-hotel', args: ['H1', 'trip-1'] });

    expect(index).toBe(0);
    expect(mock.insert).toHaveBeenCalledWith(sagaCompensations);
    expect(mock.values).toHaveBeenCalledWith({
      sagaId: 'trip-1',
      idx: 0,
      handler: 'cancel-hotel',
      args: ['H1', 'trip-1'],
    });
  });

  it('appends after the highest stored index', async () => {
    const mock = makeDbMock([{ idx: 4 }]);
    const store = new PostgresLedgerStore(mock.db);

    expect(await store.append('trip-1', { handler: 'cancel-car', args: [] })).toBe(5);
    expect(mock.values).toHaveBeenCalledWith({ sagaId: 'trip-1', idx: 5, handler: 'cancel-car', args: [] });
  });

  it('maps rows to ledger entries', async () => {
    const mock = makeDbMock([
      { sagaId: 'trip-1', idx: 0, handler: 'cancel-car', args: ['C1'], compensated: true },
      { sagaId: 'trip-1', idx: 1, handler: 'cancel-hotel', args: ['H1'], compensated: false },
    ]);
    const store = new PostgresLedgerStore(mock.db);

    expect(await store.load('trip-1')).toEqual([
      { handler: 'cancel-car', args: ['C1'], index: 0, compensated: true },
      { handler: 'cancel-hotel', args: ['H1'], index: 1, compensated: false },
    ]);
    expect(mock.from).toHaveBeenCalledWith(sagaCompensations);
    expect(mock.orderBy).toHaveBeenCalledTimes(1);
  });

  it('rejects a row whose args are not a JSON array', async () => {
    const mock = makeDbMock([
      { sagaId: 'trip-1', idx: 0, handler: 'cancel-car', args: { id: 'C1' }, compensated: false },
    ]);
    const store = new PostgresLedgerStore(mock.db);

    await expect(store.load('trip-1')).rejects.toThrow();
  });

  it('returns an empty ledger when no rows exist', async () => {
    const store = new PostgresLedgerStore(makeDbMock([]).db);
    expect(await store.load('trip-1')).toEqual([]);
  });

  it('markCompensated() updates the compensated flag', async () => {
    const mock = makeDbMock();
    await new PostgresLedgerStore(mock.db).markCompensated('trip-1', 2);

    expect(mock.update).toHaveBeenCalledWith(sagaCompensations);
    expect(mock.set).toHaveBeenCalledWith({ compensated: true });
    expect(mock.updateWhere).toHaveBeenCalledTimes(1);
  });

  it('clear() deletes the rows of the saga', async () => {
    const mock = makeDbMock();
    await new PostgresLedgerStore(mock.db).clear('trip-1');

    expect(mock.del).toHaveBeenCalledWith(sagaCompensations);
    expect(mock.deleteWhere).toHaveBeenCalledTimes(1);
  });
});

// ---------------------------------------------------------------------------
// sagaCompensations – schema export
// ---------------------------------------------------------------------------

describe('sagaCompensations schema', () => {
  it('is the saga_compensations table', () => {
    expect(getTableName(sagaCompensations)).toBe('saga_compensations');
  });

  it('exposes the ledger columns', () => {
    expect(sagaCompensations.sagaId.name).toBe('saga_id');
    expect(sagaCompensations.idx.name).toBe('idx');
    expect(sagaCompensations.args.name).toBe('args');
    expect(sagaCompensations.compensated.name).toBe('compensated');
  });
});
