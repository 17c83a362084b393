/**
 * Error types thrown synchronously by the pool.
 *
 * Connection failures are never thrown; they reach handlers as transport
 * events instead.
 *
 * @module pool/errors
 */

export type PoolErrorCode =
  | 'DUPLICATE_RELAY'
  | 'INVALID_RELAY_URL'
  | 'INVALID_SUBSCRIPTION_ID'
  | 'POOL_CLOSED';

/**
 * Error class for relay pool operations.
 *
 * Includes a machine-readable `code` for programmatic error handling.
 */
export class PoolError extends Error {
  constructor(
    message: string,
    public readonly code: PoolErrorCode,
  ) {
    super(message);
    this.name = 'PoolError';
  }
}

/** Thrown by `loadPoolConfig` when environment values fail validation. */
export class PoolConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message);
    this.name = 'PoolConfigError';
  }
}
