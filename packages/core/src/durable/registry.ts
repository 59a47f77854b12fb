import type { z } from 'zod';
import type { JsonValue } from '../serialization.js';
import { UnknownCompensationHandlerError } from '../errors.js';

/**
 * A compensation handler as stored in the registry: validates raw persisted
 * arguments and invokes the typed handler function with them.
 */
export interface RegisteredHandler {
  readonly id: string;
  /**
   * Returns one issue per mismatch between `args` and the handler's schema;
   * an empty array means the arguments are valid.
   */
  check(args: readonly JsonValue[]): string[];
  /** Parses `args` with the handler's schema and invokes the handler. */
  invoke(args: readonly JsonValue[]): unknown;
}

/**
 * Maps stable handler ids to compensation functions so that a ledger of
 * `{ handler, args }` descriptors can be replayed by a different process
 * than the one that wrote it.
 *
 * Each handler is registered with a zod tuple schema for its arguments;
 * arguments are validated when the compensation is recorded and parsed again
 * when it runs.
 *
 * @example
 * ```typescript
 * const registry = new CompensationHandlerRegistry()
 *   .register('cancel-hotel', z.tuple([z.string(), z.string()]), (bookingId, tripId) =>
 *     hotels.cancel(bookingId, tripId),
 *   );
 * ```
 */
export class CompensationHandlerRegistry {
  private readonly _handlers = new Map<string, RegisteredHandler>();

  /**
   * @throws {Error} If a handler with the same `id` is already registered.
   */
  register<TArgs extends unknown[]>(
    id: string,
    schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>,
    fn: (...args: TArgs) => unknown,
  ): this {
    if (this._handlers.has(id)) {
      throw new Error(
        `CompensationHandlerRegistry: a handler named "${id}" has already been registered. Handler ids must be unique.`,
      );
    }
    this._handlers.set(id, {
      id,
      check: (args) => {
        const parsed = schema.safeParse(args);
        return parsed.success
          ? []
          : parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      },
      invoke: (args) => fn(...schema.parse(args)),
    });
    return this;
  }

  has(id: string): boolean {
    return this._handlers.has(id);
  }

  /** Registered handler ids, in registration order. */
  ids(): string[] {
    return [...this._handlers.keys()];
  }

  /**
   * @throws {@link UnknownCompensationHandlerError} if `id` is not registered.
   */
  resolve(id: string): RegisteredHandler {
    const handler = this._handlers.get(id);
    if (!handler) {
      throw new UnknownCompensationHandlerError(id);
    }
    return handler;
  }
}
