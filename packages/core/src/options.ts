import { z } from 'zod';
import { InvalidSagaOptionsError } from './errors.js';

/**
 * Schema for {@link SagaOptions}.  Both flags default to `false`, which gives
 * a strictly reverse-order unwind that stops at the first failing
 * compensation.
 */
export const sagaOptionsSchema = z
  .object({
    /** Run every compensation concurrently instead of in reverse order. */
    parallelCompensation: z.boolean().default(false),
    /** Keep unwinding after a compensation fails (sequential mode only). */
    continueWithError: z.boolean().default(false),
  })
  .strict();

/** Options accepted by the {@link Saga} constructor. */
export type SagaOptions = z.input<typeof sagaOptionsSchema>;

/** Options after defaults have been applied. */
export type ResolvedSagaOptions = Readonly<z.output<typeof sagaOptionsSchema>>;

/**
 * Schema for {@link RetryPolicy}, modelled on activity retry options of
 * durable workflow engines.
 */
export const retryPolicySchema = z
  .object({
    maximumAttempts: z.number().int().min(1).default(3),
    initialIntervalMs: z.number().min(0).default(100),
    backoffCoefficient: z.number().min(1).default(2),
    maximumIntervalMs: z.number().min(0).default(10_000),
    /** Error `name`s that are rethrown immediately without retrying. */
    nonRetryableErrors: z.array(z.string()).default([]),
  })
  .strict()
  .refine((p) => p.maximumIntervalMs >= p.initialIntervalMs, {
    message: 'maximumIntervalMs must not be smaller than initialIntervalMs',
    path: ['maximumIntervalMs'],
  });

export type RetryPolicy = z.input<typeof retryPolicySchema>;
export type ResolvedRetryPolicy = Readonly<z.output<typeof retryPolicySchema>>;

export function resolveSagaOptions(options: SagaOptions = {}): ResolvedSagaOptions {
  return Object.freeze(parseOrThrow('SagaOptions', sagaOptionsSchema, options));
}

export function resolveRetryPolicy(policy: RetryPolicy = {}): ResolvedRetryPolicy {
  return Object.freeze(parseOrThrow('RetryPolicy', retryPolicySchema, policy));
}

function parseOrThrow<TSchema extends z.ZodTypeAny>(
  subject: string,
  schema: TSchema,
  value: unknown,
): z.output<TSchema> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidSagaOptionsError(
      subject,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return parsed.data;
}
