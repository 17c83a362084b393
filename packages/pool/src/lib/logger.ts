import { createConsola, type ConsolaInstance } from 'consola';
import { LOG_LEVEL_MAP, type LogLevelName } from '@tether/shared/config-schema';

/**
 * Logger factory for the relay pool.
 *
 * Returns a consola instance tagged `pool`. The pool builds one from its
 * configured `logging.level` unless the caller injects its own logger.
 *
 * @module pool/lib/logger
 */

/**
 * Create a consola logger tagged `pool`.
 *
 * @param options - Optional configuration
 * @param options.level - Log level name. Defaults to `info`.
 */
export function createPoolLogger(options?: { level?: LogLevelName }): ConsolaInstance {
  return createConsola({
    level: LOG_LEVEL_MAP[options?.level ?? 'info'],
  }).withTag('pool');
}
