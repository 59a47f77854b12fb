// ---------------------------------------------------------------------------
// Core – in-process saga, options, executors and errors
// ---------------------------------------------------------------------------
export type {
  Logger,
  CompensationAction,
  CompensationFailure,
  CompensationHook,
  SagaState,
} from './types.js';
export {
  AggregatedCompensationError,
  SagaStateError,
  LateRegistrationError,
  InvalidSagaOptionsError,
  InvalidCompensationArgumentsError,
  RetryExhaustedError,
  UnknownCompensationHandlerError,
} from './errors.js';
export { sagaOptionsSchema, retryPolicySchema, resolveSagaOptions, resolveRetryPolicy } from './options.js';
export type { SagaOptions, ResolvedSagaOptions, RetryPolicy, ResolvedRetryPolicy } from './options.js';
export { Saga } from './saga.js';
export type { SagaDependencies } from './saga.js';
export { DirectExecutor, RetryingExecutor } from './step-executor.js';
export type { StepExecutor, RetryingExecutorOptions, Sleep } from './step-executor.js';
export { SerializationError, isJsonValue, assertJsonArgs } from './serialization.js';
export type { JsonValue } from './serialization.js';

// ---------------------------------------------------------------------------
// Durable ledger – survives process restarts through a pluggable store
// ---------------------------------------------------------------------------
export {
  DurableSaga,
  CompensationHandlerRegistry,
  InMemoryLedgerStore,
  compensationDescriptorSchema,
  jsonValueSchema,
} from './durable/index.js';
export type {
  RegisteredHandler,
  CompensationLedgerStore,
  CompensationDescriptor,
  LedgerEntry,
} from './durable/index.js';

// ---------------------------------------------------------------------------
// Templates – copy-and-customise starting points for common sagas
// ---------------------------------------------------------------------------
export { bookTrip } from './templates/index.js';
export type { TripBookingActivities, TripBooking } from './templates/index.js';
