/** Any value that survives a `JSON.stringify` / `JSON.parse` round trip. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Thrown when the arguments bound to a durable compensation cannot be
 * round-tripped through `JSON.stringify` / `JSON.parse`.
 *
 * A durable ledger outlives the process that wrote it, so every argument must
 * be plain data.  Class instances lose their prototype, `undefined` and
 * functions disappear and circular objects cannot be stored at all; the
 * {@link DurableSaga} rejects such arguments before anything is written to
 * the {@link CompensationLedgerStore}.
 */
export class SerializationError extends Error {
  /** Handler id of the compensation whose arguments were rejected. */
  readonly handler: string;
  /** Which argument was rejected. */
  readonly cause: unknown;

  constructor(handler: string, cause: unknown) {
    super(
      `DurableSaga: arguments for compensation "${handler}" are not JSON-serializable. ` +
        `Bind only plain objects, arrays, strings, finite numbers, booleans and null.`,
    );
    this.name = 'SerializationError';
    this.handler = handler;
    this.cause = cause;
  }
}

/**
 * Returns `true` when `value` is a {@link JsonValue}: plain data that
 * `JSON.stringify` preserves exactly.
 *
 * @example
 * ```typescript
 * isJsonValue({ id: 1 })        // true
 * isJsonValue(new Date())       // false (class instance)
 * isJsonValue([1, undefined])   // false (undefined becomes null)
 * isJsonValue([1, , 3])         // false (the hole becomes null)
 * ```
 */
export function isJsonValue(value: unknown, seen: Set<object> = new Set()): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (typeof value !== 'object') {
    return false;
  }
  if (seen.has(value)) {
    return false;
  }
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      // Holes are serialized as null.
      for (let i = 0; i < value.length; i++) {
        if (!(i in value) || !isJsonValue(value[i], seen)) {
          return false;
        }
      }
      return true;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) {
      return false;
    }
    return Object.values(value).every((item) => isJsonValue(item, seen));
  } finally {
    seen.delete(value);
  }
}

/**
 * Narrows `args` to `JsonValue[]`, throwing a {@link SerializationError}
 * naming `handler` when any argument is not plain JSON data.
 */
export function assertJsonArgs(args: readonly unknown[], handler: string): asserts args is JsonValue[] {
  const index = args.findIndex((arg) => !isJsonValue(arg));
  if (index !== -1) {
    throw new SerializationError(handler, `argument ${index} is not a JSON value`);
  }
}
