export { DurableSaga } from './durable-saga.js';
export { CompensationHandlerRegistry } from './registry.js';
export type { RegisteredHandler } from './registry.js';
export { InMemoryLedgerStore, compensationDescriptorSchema, jsonValueSchema } from './persistence.js';
export type { CompensationLedgerStore, CompensationDescriptor, LedgerEntry } from './persistence.js';
