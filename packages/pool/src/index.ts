/**
 * @tether/pool -- Relay connection pool.
 *
 * Multiplexes subscriptions and publishes across many relays, queues
 * requests for relays that are not yet connected, and reconnects relays
 * when the network comes back or an attempt gets stuck.
 *
 * @module pool
 */

// Main entry point
export { RelayPool, addRwRelay } from './relay-pool.js';
export { createSubscriptionId } from './subscription-id.js';

// Sub-modules (for advanced usage)
export { Relay } from './relay.js';
export { HandlerRegistry } from './handler-registry.js';
export type { SubscriptionHandler } from './handler-registry.js';
export { RequestQueue, MAX_QUEUED_PER_RELAY } from './request-queue.js';
export type { QueuedRequest, EnqueueResult } from './request-queue.js';
export { DedupLedger, dedupKey } from './dedup-ledger.js';
export { SerialQueue } from './serial-queue.js';
export type { SerialTask } from './serial-queue.js';
export { NetworkMonitor, deriveNetworkStatus } from './network-monitor.js';
export type { NetworkMonitorOptions, InterfaceTable } from './network-monitor.js';
export {
  WebSocketRelayConnection,
  createWebSocketConnectionFactory,
  rawDataToString,
  CLIENT_CLOSE_CODE,
  CLIENT_CLOSE_REASON,
} from './relay-connection.js';
export type { WebSocketRelayConnectionOptions } from './relay-connection.js';

// Pure functions
export { planReconnect, isReachable, shouldReconcile, STALE_CONNECTION_MS } from './reconnect-policy.js';
export type { ReconnectAction, RelayReconnectState } from './reconnect-policy.js';

// Config, logging & errors
export { loadPoolConfig } from './config.js';
export type { PoolEnv } from './config.js';
export { createPoolLogger } from './lib/logger.js';
export { PoolError, PoolConfigError } from './errors.js';
export type { PoolErrorCode } from './errors.js';

// Types
export type {
  ConnectionStatus,
  TransportEvent,
  ConnectionEvent,
  ConnectionEventListener,
  RelayConnection,
  ConnectionFactory,
  RelayEventHandler,
  NetworkStatus,
  NetworkStatusListener,
  NetworkMonitorLike,
  PoolLogger,
  QueueDrop,
  RelayPoolOptions,
  ReconcileResult,
  PoolStats,
} from './types.js';
