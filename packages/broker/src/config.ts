/**
 * Broker configuration loading.
 *
 * Wraps the shared zod schemas so callers get a fully resolved
 * {@link BrokerConfig} or a {@link ConfigError} listing every issue.
 *
 * @module broker/config
 */
import type { ZodError } from 'zod';
import {
  BrokerConfigSchema,
  brokerEnvSchema,
  type BrokerConfig,
  type BrokerConfigInput,
} from '@hubwire/shared/config-schema';

/** Error thrown when configuration input fails validation. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(source: string, error: ZodError) {
    const issues = error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    super(`Invalid ${source}:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Resolve partial configuration input into a complete config.
 *
 * @param input - Partial config; omitted fields take their defaults
 * @throws ConfigError when a field is present but invalid
 */
export function resolveBrokerConfig(input: BrokerConfigInput = {}): BrokerConfig {
  const result = BrokerConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError('broker config', result.error);
  }
  return result.data;
}

/**
 * Build a config from `HUBWIRE_*` environment variables.
 *
 * @param env - Environment to read, `process.env` by default
 * @param base - Config input the environment overrides
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env,
  base: BrokerConfigInput = {},
): BrokerConfig {
  const result = brokerEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError('environment', result.error);
  }
  const vars = result.data;

  return resolveBrokerConfig({
    ...base,
    ...(vars.HUBWIRE_SUBSCRIPTION_POLICY ? { subscriptionPolicy: vars.HUBWIRE_SUBSCRIPTION_POLICY } : {}),
    ...(vars.HUBWIRE_LOG_LEVEL ? { logging: { level: vars.HUBWIRE_LOG_LEVEL } } : {}),
    ...(vars.HUBWIRE_FEED_CAPACITY !== undefined ? { feed: { capacity: vars.HUBWIRE_FEED_CAPACITY } } : {}),
  });
}
