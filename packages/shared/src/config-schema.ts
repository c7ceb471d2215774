import { z } from 'zod';

const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
});

export type LogLevelName = z.infer<typeof LoggingConfigSchema>['level'];

/**
 * How repeated subscriptions of the same handler kind map onto the
 * reachability graph.
 *
 * - `per-kind`: every instance of a kind shares one graph node; the kind's
 *   listens and emits accumulate across instances.
 * - `per-instance`: each subscription is its own node.
 */
export const SubscriptionPolicySchema = z.enum(['per-kind', 'per-instance']);

export type SubscriptionPolicy = z.infer<typeof SubscriptionPolicySchema>;

export const BrokerConfigSchema = z.object({
  subscriptionPolicy: SubscriptionPolicySchema.default('per-kind'),
  logging: LoggingConfigSchema.default(() => ({ level: 'info' as const })),
  feed: z
    .object({
      capacity: z.number().int().positive().nullable().default(null),
    })
    .default(() => ({ capacity: null })),
});

export type BrokerConfig = z.infer<typeof BrokerConfigSchema>;

/** Input accepted by the config schema before defaults are applied. */
export type BrokerConfigInput = z.input<typeof BrokerConfigSchema>;

/** Maps log level names to numeric values for consola compatibility */
export const LOG_LEVEL_MAP: Record<LogLevelName, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

export const BROKER_CONFIG_DEFAULTS: BrokerConfig = BrokerConfigSchema.parse({});

/** Reusable Zod type for optional positive integers read from env strings. */
const optionalCount = z.coerce.number().int().positive().optional();

/** Environment variables recognised by the broker. All optional. */
export const brokerEnvSchema = z.object({
  HUBWIRE_SUBSCRIPTION_POLICY: SubscriptionPolicySchema.optional(),
  HUBWIRE_LOG_LEVEL: LoggingConfigSchema.shape.level.removeDefault().optional(),
  HUBWIRE_FEED_CAPACITY: optionalCount,
});

export type BrokerEnv = z.infer<typeof brokerEnvSchema>;
