import { z } from 'zod';

export const LogLevelNameSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

export type LogLevelName = z.infer<typeof LogLevelNameSchema>;

const LoggingConfigSchema = z.object({
  level: LogLevelNameSchema.default('info'),
});

export const PoolConfigSchema = z.object({
  /** A relay stuck in `connecting` longer than this is force-reconnected. */
  staleConnectionMs: z.number().int().min(0).default(5_000),
  /** Per-relay bound on requests waiting for a connection. */
  maxQueuedPerRelay: z.number().int().min(0).default(10),
  /** Period of the background reconciliation pass; 0 disables the timer. */
  reconcileIntervalMs: z.number().int().min(0).default(30_000),
  networkPollIntervalMs: z.number().int().min(100).default(5_000),
  logging: LoggingConfigSchema.default(() => ({ level: 'info' as const })),
});

export type PoolConfig = z.infer<typeof PoolConfigSchema>;
export type PoolConfigInput = z.input<typeof PoolConfigSchema>;

/** Maps log level names to numeric values for consola compatibility */
export const LOG_LEVEL_MAP: Record<LogLevelName, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

/** Defaults extracted from schema */
export const POOL_CONFIG_DEFAULTS: PoolConfig = PoolConfigSchema.parse({});
