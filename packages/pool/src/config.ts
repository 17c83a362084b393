import { z } from 'zod';
import { LogLevelNameSchema, PoolConfigSchema, type PoolConfig } from '@tether/shared/config-schema';
import { PoolConfigError } from './errors.js';

/** Integer variable; a blank value is an error rather than 0. */
const intVar = (min: number) =>
  z.string().trim().min(1, 'must not be empty').pipe(z.coerce.number().int().min(min));

const poolEnvSchema = z.object({
  TETHER_STALE_CONNECTION_MS: intVar(0).optional(),
  TETHER_MAX_QUEUED_PER_RELAY: intVar(0).optional(),
  TETHER_RECONCILE_INTERVAL_MS: intVar(0).optional(),
  TETHER_NETWORK_POLL_MS: intVar(100).optional(),
  TETHER_LOG_LEVEL: LogLevelNameSchema.optional(),
});

export type PoolEnv = z.infer<typeof poolEnvSchema>;

/**
 * Build a PoolConfig from environment variables.
 *
 * Unset variables fall back to the schema defaults.
 *
 * @param env - Variables to read. Defaults to `process.env`.
 * @throws PoolConfigError listing every invalid variable
 */
export function loadPoolConfig(env: NodeJS.ProcessEnv = process.env): PoolConfig {
  const result = poolEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new PoolConfigError('Invalid pool environment variables', issues);
  }

  const vars = result.data;
  return PoolConfigSchema.parse({
    staleConnectionMs: vars.TETHER_STALE_CONNECTION_MS,
    maxQueuedPerRelay: vars.TETHER_MAX_QUEUED_PER_RELAY,
    reconcileIntervalMs: vars.TETHER_RECONCILE_INTERVAL_MS,
    networkPollIntervalMs: vars.TETHER_NETWORK_POLL_MS,
    logging: vars.TETHER_LOG_LEVEL ? { level: vars.TETHER_LOG_LEVEL } : undefined,
  });
}
