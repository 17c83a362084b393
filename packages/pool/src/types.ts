/**
 * Internal type definitions for the @tether/pool package.
 *
 * Collaborator contracts (connection, network monitor, logger) and the
 * event shapes that flow from connections into the pool live here so that
 * modules can share them without importing each other.
 *
 * @module pool/types
 */
import type { NostrRequest, RelayMessage, RelayUrl } from '@tether/shared/relay-schemas';
import type { PoolConfigInput } from '@tether/shared/config-schema';

// === Connection ===

export type ConnectionStatus = 'disconnected' | 'connecting' | 'connected';

/** Transport-level lifecycle events emitted by a connection. */
export type TransportEvent =
  | { type: 'connecting' }
  | { type: 'connected' }
  | { type: 'disconnected'; code: number; reason: string }
  | { type: 'error'; error: Error };

/** Everything a connection reports back to the pool. */
export type ConnectionEvent =
  | { kind: 'transport'; event: TransportEvent }
  | { kind: 'message'; message: RelayMessage };

export type ConnectionEventListener = (event: ConnectionEvent) => void;

/**
 * One physical duplex channel to one relay.
 *
 * All methods are fire-and-forget: outcomes come back as
 * {@link ConnectionEvent}s through the listener the connection was built with.
 */
export interface RelayConnection {
  readonly url: RelayUrl;
  readonly isConnected: boolean;
  readonly isConnecting: boolean;
  /** Epoch ms at which the latest connect attempt began (0 if never). */
  readonly lastConnectionAttempt: number;
  connect(): void;
  disconnect(): void;
  /** Cancel any in-flight attempt or open socket and start a fresh one. */
  reconnect(): void;
  send(request: NostrRequest): void;
}

export type ConnectionFactory = (
  url: RelayUrl,
  onEvent: ConnectionEventListener,
) => RelayConnection;

// === Handlers ===

/**
 * Callback invoked with every inbound event from every relay.
 *
 * Delivery is not filtered by subscription id; handlers that care must
 * inspect the event themselves.
 */
export type RelayEventHandler = (relay: RelayUrl, event: ConnectionEvent) => void;

// === Network Reachability ===

export type NetworkStatus = 'unsatisfied' | 'satisfied' | 'requires-connection';

export type NetworkStatusListener = (status: NetworkStatus) => void;

/** Host-level reachability source. */
export interface NetworkMonitorLike {
  start(listener: NetworkStatusListener): void;
  stop(): void;
}

// === Logging ===

/** Logger surface used across the pool; a consola instance satisfies it. */
export interface PoolLogger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

// === Pool ===

/** Reported when a request is refused because its relay's queue is full. */
export interface QueueDrop {
  relay: RelayUrl;
  request: NostrRequest;
  /** Requests already waiting for that relay. */
  queued: number;
}

export interface RelayPoolOptions {
  config?: PoolConfigInput;
  /** Builds the connection for each added relay. Defaults to WebSocketRelayConnection. */
  connectionFactory?: ConnectionFactory;
  /** Defaults to a NetworkMonitor polling the host's interfaces. */
  networkMonitor?: NetworkMonitorLike;
  /** Defaults to a consola logger at `config.logging.level`. */
  logger?: PoolLogger;
  /** Clock used for stale-connection checks. */
  now?: () => number;
  onDrop?: (drop: QueueDrop) => void;
}

/** Summary of a reconciliation pass. */
export interface ReconcileResult {
  /** Idle relays that were asked to connect. */
  connected: number;
  /** Stale connecting relays that were force-reconnected. */
  reconnected: number;
  /** Broken, connecting or connected relays left alone. */
  skipped: number;
}

export interface PoolStats {
  relays: number;
  connected: number;
  connecting: number;
  broken: number;
  queued: number;
  handlers: number;
  /** Distinct (relay, event id) pairs recorded by the dedup ledger. */
  seen: number;
  /** Distinct event ids received, per relay URL. */
  received: Record<string, number>;
}
