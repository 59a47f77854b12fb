import { describe, it, expect } from 'vitest';
import { SerializationError, isJsonValue, assertJsonArgs } from '../serialization.js';

describe('isJsonValue()', () => {
  it('accepts primitives, arrays and plain objects', () => {
    expect(isJsonValue('trip-1')).toBe(true);
    expect(isJsonValue(-20)).toBe(true);
    expect(isJsonValue(false)).toBe(true);
    expect(isJsonValue(null)).toBe(true);
    expect(isJsonValue([1, 'two', [3]])).toBe(true);
    expect(isJsonValue({ bookingId: 'H1', nights: 2, meta: { late: true } })).toBe(true);
    expect(isJsonValue(Object.create(null))).toBe(true);
  });

  it('rejects values that JSON.stringify drops or changes', () => {
    expect(isJsonValue(undefined)).toBe(false);
    expect(isJsonValue(() => undefined)).toBe(false);
    expect(isJsonValue(Number.NaN)).toBe(false);
    expect(isJsonValue(Number.POSITIVE_INFINITY)).toBe(false);
    expect(isJsonValue(10n)).toBe(false);
    expect(isJsonValue([1, undefined])).toBe(false);
    expect(isJsonValue([1, , 3])).toBe(false);
    expect(isJsonValue(new Array(2))).toBe(false);
    expect(isJsonValue({ at: new Date(0) })).toBe(false);
    expect(isJsonValue(new Map())).toBe(false);
  });

  it('rejects circular structures', () => {
    const node: Record<string, unknown> = { id: 1 };
    node['self'] = node;
    expect(isJsonValue(node)).toBe(false);
  });

  it('accepts the same object referenced twice without a cycle', () => {
    const shared = { id: 1 };
    expect(isJsonValue({ a: shared, b: shared })).toBe(true);
  });
});

describe('assertJsonArgs()', () => {
  it('does not throw for plain data', () => {
    expect(() => assertJsonArgs(['H1', 2, { ok: true }], 'cancel-hotel')).not.toThrow();
  });

  it('throws a SerializationError naming the handler and argument', () => {
    let caught: unknown;
    try {
      assertJsonArgs(['H1', new Date(0)], 'cancel-hotel');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(SerializationError);
    expect(caught).toMatchObject({
      name: 'SerializationError',
      handler: 'cancel-hotel',
      cause: 'argument 1 is not a JSON value',
    });
  });
});
