import type { CompensationFailure, SagaState } from './types.js';

/**
 * Thrown by {@link Saga.compensate} when one or more compensations failed.
 *
 * Each failure's `index` is its zero-based registration position: the
 * second compensation registered is reported as `#1`.
 *
 * With `continueWithError: false` (sequential mode) `failures` holds exactly
 * the one compensation that stopped the unwind.  Otherwise it lists every
 * failure: in encounter order for a sequential unwind, in registration order
 * for a parallel one.  Compensation failures are never swallowed; the caller
 * is expected to surface them for manual remediation.
 */
export class AggregatedCompensationError extends Error {
  /** Every compensation that failed, in the order described above. */
  readonly failures: readonly CompensationFailure[];
  /** The forward-step error that triggered the unwind, when known. */
  readonly cause: unknown;

  constructor(failures: readonly CompensationFailure[], cause?: unknown) {
    const summary = failures
      .map((f) => `#${f.index} "${f.name}": ${describeCause(f.cause)}`)
      .join('; ');
    super(
      `AggregatedCompensationError: ${failures.length} compensation(s) failed (${summary}). Manual intervention may be required.`,
    );
    this.name = 'AggregatedCompensationError';
    this.failures = Object.freeze([...failures]);
    this.cause = cause;
  }
}

/**
 * Thrown when an operation is not permitted in the saga's current state,
 * e.g. registering a compensation after `compensate()` has begun.
 */
export class SagaStateError extends Error {
  readonly state: SagaState;

  constructor(operation: string, state: SagaState) {
    super(`Saga: cannot ${operation} while the saga is "${state}".`);
    this.name = 'SagaStateError';
    this.state = state;
  }
}

/**
 * Thrown by {@link Saga.perform} when the forward step succeeded after
 * `compensate()` had already begun, so its compensation could not be
 * registered.  `result` is what the step returned; the caller owns undoing it.
 */
export class LateRegistrationError extends SagaStateError {
  readonly stepName: string;
  readonly result: unknown;

  constructor(stepName: string, state: SagaState, result: unknown) {
    super(`register compensation for completed step "${stepName}"`, state);
    this.name = 'LateRegistrationError';
    this.stepName = stepName;
    this.result = result;
  }
}

/**
 * Thrown when saga options or a retry policy fail validation.
 */
export class InvalidSagaOptionsError extends Error {
  /** One entry per validation issue, formatted as `path: message`. */
  readonly issues: readonly string[];

  constructor(subject: string, issues: readonly string[]) {
    super(`${subject}: invalid configuration (${issues.join('; ')}).`);
    this.name = 'InvalidSagaOptionsError';
    this.issues = issues;
  }
}

/**
 * Thrown by {@link RetryingExecutor} once every attempt allowed by its
 * policy has failed.
 */
export class RetryExhaustedError extends Error {
  readonly stepName: string;
  readonly attempts: number;
  /** The error thrown by the final attempt. */
  readonly cause: unknown;

  constructor(stepName: string, attempts: number, cause: unknown) {
    super(
      `RetryExhaustedError: step "${stepName}" failed after ${attempts} attempt(s): ${describeCause(cause)}`,
    );
    this.name = 'RetryExhaustedError';
    this.stepName = stepName;
    this.attempts = attempts;
    this.cause = cause;
  }
}

/**
 * Thrown when a durable ledger references a compensation handler id that is
 * not present in the {@link CompensationHandlerRegistry}.
 */
export class UnknownCompensationHandlerError extends Error {
  readonly handler: string;

  constructor(handler: string) {
    super(`CompensationHandlerRegistry: no handler registered under "${handler}".`);
    this.name = 'UnknownCompensationHandlerError';
    this.handler = handler;
  }
}

/**
 * Thrown when the arguments bound to a durable compensation do not match the
 * schema its handler was registered with.
 */
export class InvalidCompensationArgumentsError extends Error {
  readonly handler: string;
  readonly issues: readonly string[];

  constructor(handler: string, issues: readonly string[]) {
    super(`DurableSaga: invalid arguments for compensation "${handler}" (${issues.join('; ')}).`);
    this.name = 'InvalidCompensationArgumentsError';
    this.handler = handler;
    this.issues = issues;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
