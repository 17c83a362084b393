/**
 * Main entry point for the relay connection pool.
 *
 * Composes the relay set, HandlerRegistry, RequestQueue, DedupLedger,
 * reconnection policy and NetworkMonitor behind one synchronous API. All
 * state lives inside a single SerialQueue: public operations run in it, and
 * connection callbacks, reachability changes and the reconcile timer reach
 * state only by posting tasks to it.
 *
 * Outbound requests go straight to connected relays and wait in a bounded
 * per-relay queue otherwise; the queue is flushed when the relay reports
 * `connected`. Every inbound event is recorded in the ledger and then fanned
 * out to every registered handler.
 *
 * @module pool/relay-pool
 */
import {
  RELAY_INFO_RW,
  SubscriptionIdSchema,
  parseRelayUrl,
  type NostrEvent,
  type NostrFilter,
  type NostrRequest,
  type RelayDescriptor,
  type RelayInfo,
  type RelayUrl,
} from '@tether/shared/relay-schemas';
import { describeRequest } from '@tether/shared/relay-codec';
import { PoolConfigSchema, type PoolConfig } from '@tether/shared/config-schema';
import { Relay } from './relay.js';
import { HandlerRegistry } from './handler-registry.js';
import { RequestQueue } from './request-queue.js';
import { DedupLedger } from './dedup-ledger.js';
import { SerialQueue } from './serial-queue.js';
import { planReconnect, shouldReconcile } from './reconnect-policy.js';
import { NetworkMonitor } from './network-monitor.js';
import { createWebSocketConnectionFactory } from './relay-connection.js';
import { createPoolLogger } from './lib/logger.js';
import { PoolConfigError, PoolError } from './errors.js';
import type {
  ConnectionEvent,
  ConnectionFactory,
  NetworkMonitorLike,
  NetworkStatus,
  PoolLogger,
  PoolStats,
  QueueDrop,
  ReconcileResult,
  RelayEventHandler,
  RelayPoolOptions,
} from './types.js';

// === RelayPool ===

/**
 * Pool of relay connections with queued sends and automatic reconnection.
 *
 * @example
 * ```ts
 * const pool = new RelayPool();
 * pool.addRelay('wss://relay.example.com');
 * pool.connect();
 * pool.start();
 *
 * pool.subscribe(createSubscriptionId(), [{ kinds: [1], limit: 20 }], (relay, event) => {
 *   if (event.kind === 'message' && event.message.type === 'event') {
 *     console.log(relay, event.message.event.content);
 *   }
 * });
 *
 * pool.close();
 * ```
 */
export class RelayPool {
  private relays: Relay[] = [];
  private readonly handlers = new HandlerRegistry();
  private readonly queue: RequestQueue;
  private readonly ledger = new DedupLedger();
  private readonly serial: SerialQueue;
  private readonly config: PoolConfig;
  private readonly logger: PoolLogger;
  private readonly connectionFactory: ConnectionFactory;
  private readonly networkMonitor: NetworkMonitorLike;
  private readonly now: () => number;
  private readonly onDrop: ((drop: QueueDrop) => void) | undefined;
  private lastNetworkStatus: NetworkStatus = 'unsatisfied';
  private reconcileTimer: ReturnType<typeof setInterval> | null = null;
  private started = false;
  private closed = false;

  /**
   * @param options - Collaborators and configuration; all optional
   * @throws PoolConfigError when `options.config` fails validation
   */
  constructor(options: RelayPoolOptions = {}) {
    const parsed = PoolConfigSchema.safeParse(options.config ?? {});
    if (!parsed.success) {
      throw new PoolConfigError(
        'Invalid pool configuration',
        parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      );
    }
    this.config = parsed.data;
    this.logger = options.logger ?? createPoolLogger({ level: this.config.logging.level });
    this.now = options.now ?? Date.now;
    this.onDrop = options.onDrop;
    this.queue = new RequestQueue(this.config.maxQueuedPerRelay);
    this.serial = new SerialQueue(this.logger);
    this.connectionFactory =
      options.connectionFactory ??
      createWebSocketConnectionFactory({ logger: this.logger, now: this.now });
    this.networkMonitor =
      options.networkMonitor ??
      new NetworkMonitor({ pollIntervalMs: this.config.networkPollIntervalMs });
  }

  // --- Relay set ---

  /**
   * Add a relay to the pool. Does not connect.
   *
   * @param url - Relay URL; normalised before use
   * @param info - Read/write capabilities
   * @returns The normalised relay URL
   * @throws PoolError `INVALID_RELAY_URL` or `DUPLICATE_RELAY`
   */
  addRelay(url: string, info: RelayInfo = RELAY_INFO_RW): RelayUrl {
    this.assertOpen();
    const relayUrl = parseRelayUrl(url);
    if (!relayUrl) {
      throw new PoolError(`Invalid relay URL: ${url}`, 'INVALID_RELAY_URL');
    }

    return this.serial.run(() => {
      if (this.findRelay(relayUrl)) {
        throw new PoolError(`Relay already in pool: ${relayUrl}`, 'DUPLICATE_RELAY');
      }
      const connection = this.connectionFactory(relayUrl, (event) => {
        this.serial.post(() => this.handleEvent(relayUrl, event));
      });
      this.relays.push(new Relay({ url: relayUrl, info }, connection));
      this.logger.debug(`relay added: ${relayUrl}`);
      return relayUrl;
    });
  }

  /**
   * Disconnect and remove a relay, dropping its queued requests.
   *
   * @returns `true` if the relay was in the pool
   */
  removeRelay(url: string): boolean {
    this.assertOpen();
    return this.serial.run(() => {
      const relay = this.lookup(url);
      if (!relay) return false;

      relay.connection.disconnect();
      this.relays = this.relays.filter((r) => r !== relay);
      const purged = this.queue.purge(relay.id);
      this.logger.debug(`relay removed: ${relay.id} (${purged} queued request(s) dropped)`);
      return true;
    });
  }

  /** Mark a relay broken so reconciliation leaves it alone. */
  markBroken(url: string): boolean {
    this.assertOpen();
    return this.serial.run(() => {
      const relay = this.lookup(url);
      if (!relay) return false;
      relay.markBroken();
      this.logger.debug(`relay marked broken: ${relay.id}`);
      return true;
    });
  }

  // --- Lifecycle ---

  /** Connect the given relays, or all relays. */
  connect(urls?: string[]): void {
    this.assertOpen();
    this.serial.run(() => {
      for (const relay of this.selectRelays(urls)) relay.connection.connect();
    });
  }

  /** Disconnect the given relays, or all relays. */
  disconnect(urls?: string[]): void {
    this.assertOpen();
    this.serial.run(() => {
      for (const relay of this.selectRelays(urls)) relay.connection.disconnect();
    });
  }

  /** Force a fresh connection on the given relays, or all relays. Ignores `broken`. */
  reconnect(urls?: string[]): void {
    this.assertOpen();
    this.serial.run(() => {
      for (const relay of this.selectRelays(urls)) relay.connection.reconnect();
    });
  }

  /**
   * Reconciliation pass: connect idle relays and restart stuck attempts.
   *
   * Broken relays are skipped.
   */
  connectToDisconnected(): ReconcileResult {
    this.assertOpen();
    return this.serial.run(() => {
      const result: ReconcileResult = { connected: 0, reconnected: 0, skipped: 0 };
      const now = this.now();

      for (const relay of this.relays) {
        const action = planReconnect(
          {
            status: relay.status,
            isBroken: relay.isBroken,
            lastConnectionAttempt: relay.connection.lastConnectionAttempt,
          },
          now,
          this.config.staleConnectionMs,
        );

        switch (action) {
          case 'connect':
            relay.connection.connect();
            result.connected++;
            break;
          case 'reconnect':
            this.logger.warn(
              `relay ${relay.id} stuck connecting for ${now - relay.connection.lastConnectionAttempt}ms, reconnecting`,
            );
            relay.connection.reconnect();
            result.reconnected++;
            break;
          case 'skip':
            result.skipped++;
            break;
        }
      }

      return result;
    });
  }

  /**
   * Start the network monitor and the periodic reconciliation timer.
   *
   * Idempotent.
   */
  start(): void {
    this.assertOpen();
    this.serial.run(() => {
      if (this.started) return;
      this.started = true;

      this.networkMonitor.start((status) => {
        this.serial.post(() => this.handleNetworkStatus(status));
      });

      if (this.config.reconcileIntervalMs > 0) {
        this.reconcileTimer = setInterval(() => {
          this.serial.post(() => this.reconcileTick());
        }, this.config.reconcileIntervalMs);
        this.reconcileTimer.unref();
      }
    });
  }

  /**
   * Stop background work and disconnect every relay.
   *
   * Idempotent. Events raised by the disconnects are not delivered, and
   * every mutating call afterwards throws `POOL_CLOSED`.
   */
  close(): void {
    if (this.closed) return;
    this.serial.run(() => {
      this.closed = true;
      this.networkMonitor.stop();
      if (this.reconcileTimer) {
        clearInterval(this.reconcileTimer);
        this.reconcileTimer = null;
      }
      for (const relay of this.relays) relay.connection.disconnect();
      this.logger.debug(`pool closed (${this.relays.length} relay(s))`);
    });
  }

  // --- Handlers & subscriptions ---

  /**
   * Register an event handler. The first handler under an id wins.
   *
   * @returns `false` if a handler was already registered under the id
   * @throws PoolError `INVALID_SUBSCRIPTION_ID` for an empty id or one over 64 chars
   */
  registerHandler(subscriptionId: string, handler: RelayEventHandler): boolean {
    this.assertOpen();
    this.assertSubscriptionId(subscriptionId);
    return this.serial.run(() => this.handlers.register(subscriptionId, handler));
  }

  removeHandler(subscriptionId: string): boolean {
    this.assertOpen();
    return this.serial.run(() => this.handlers.remove(subscriptionId));
  }

  /** Register `handler` (unless the id is taken) and send a subscribe request. */
  subscribe(
    subscriptionId: string,
    filters: NostrFilter[],
    handler: RelayEventHandler,
    targets?: string[],
  ): void {
    this.assertOpen();
    this.assertSubscriptionId(subscriptionId);
    this.serial.run(() => {
      this.handlers.register(subscriptionId, handler);
      this.send({ type: 'subscribe', subscriptionId, filters }, targets);
    });
  }

  /**
   * Send an unsubscribe request. Without `targets` the handler is removed
   * too; with targets it stays registered for the remaining relays.
   */
  unsubscribe(subscriptionId: string, targets?: string[]): void {
    this.assertOpen();
    this.assertSubscriptionId(subscriptionId);
    this.serial.run(() => {
      if (!targets) this.handlers.remove(subscriptionId);
      this.send({ type: 'unsubscribe', subscriptionId }, targets);
    });
  }

  // --- Sending ---

  /**
   * Send a request to the given relays, or all relays.
   *
   * Connected relays get it immediately; the rest queue it until they
   * connect. URLs not in the pool are ignored.
   */
  send(request: NostrRequest, targets?: string[]): void {
    this.assertOpen();
    this.serial.run(() => {
      for (const relay of this.selectRelays(targets)) this.sendTo(relay, request);
    });
  }

  /** Publish an event to the given relays, or all relays. */
  publish(event: NostrEvent, targets?: string[]): void {
    this.send({ type: 'event', event }, targets);
  }

  // --- Accessors ---

  /** Frozen descriptors of every relay, in pool order. */
  get descriptors(): RelayDescriptor[] {
    return this.relays.map((r) => r.descriptor);
  }

  get relayCount(): number {
    return this.relays.length;
  }

  get numConnecting(): number {
    return this.relays.filter((r) => r.status === 'connecting').length;
  }

  get numConnected(): number {
    return this.relays.filter((r) => r.status === 'connected').length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  getRelay(url: string): Relay | undefined {
    return this.lookup(url);
  }

  /** Relays matching the given URLs, in pool order. */
  getRelays(urls: string[]): Relay[] {
    return this.selectRelays(urls);
  }

  countQueued(url: string): number {
    const relayUrl = parseRelayUrl(url);
    return relayUrl ? this.queue.countFor(relayUrl) : 0;
  }

  receivedCount(url: string): number {
    const relayUrl = parseRelayUrl(url);
    return relayUrl ? this.ledger.receivedCount(relayUrl) : 0;
  }

  hasSeen(url: string, eventId: string): boolean {
    const relayUrl = parseRelayUrl(url);
    return relayUrl ? this.ledger.has(relayUrl, eventId) : false;
  }

  getStats(): PoolStats {
    return {
      relays: this.relays.length,
      connected: this.numConnected,
      connecting: this.numConnecting,
      broken: this.relays.filter((r) => r.isBroken).length,
      queued: this.queue.size,
      handlers: this.handlers.size,
      seen: this.ledger.size,
      received: this.ledger.countsByRelay(),
    };
  }

  // --- Private helpers ---

  /** Single ingestion point for everything connections report. */
  private handleEvent(relayUrl: RelayUrl, event: ConnectionEvent): void {
    if (this.closed) return;

    if (event.kind === 'message' && event.message.type === 'event') {
      this.ledger.record(relayUrl, event.message.event.id);
    }

    if (event.kind === 'transport' && event.event.type === 'connected') {
      this.runQueue(relayUrl);
    }

    for (const { subscriptionId, callback } of this.handlers.list()) {
      try {
        callback(relayUrl, event);
      } catch (err) {
        this.logger.error(`handler ${subscriptionId} failed on event from ${relayUrl}:`, err);
      }
    }
  }

  /** Re-send everything queued for a relay through the normal send path. */
  private runQueue(relayUrl: RelayUrl): void {
    const relay = this.findRelay(relayUrl);
    const pending = this.queue.flush(relayUrl);
    if (!relay || pending.length === 0) return;

    this.logger.debug(`flushing ${pending.length} queued request(s) to ${relayUrl}`);
    for (const entry of pending) this.sendTo(relay, entry.request);
  }

  private sendTo(relay: Relay, request: NostrRequest): void {
    if (relay.connection.isConnected) {
      relay.connection.send(request);
      return;
    }

    const result = this.queue.enqueue(request, relay.id);
    if (result.queued) {
      this.logger.debug(`queued ${describeRequest(request)} for ${relay.id} (${result.depth} waiting)`);
      return;
    }

    this.logger.warn(
      `queue full for ${relay.id} (${result.depth} waiting), dropping ${describeRequest(request)}`,
    );
    this.onDrop?.({ relay: relay.id, request, queued: result.depth });
  }

  private handleNetworkStatus(status: NetworkStatus): void {
    const previous = this.lastNetworkStatus;
    this.lastNetworkStatus = status;
    if (this.closed || !shouldReconcile(previous, status)) return;

    this.logger.info(`network ${previous} -> ${status}, reconnecting relays`);
    this.connectToDisconnected();
  }

  private reconcileTick(): void {
    if (this.closed) return;
    this.connectToDisconnected();
  }

  private findRelay(relayUrl: RelayUrl): Relay | undefined {
    return this.relays.find((r) => r.id === relayUrl);
  }

  private lookup(url: string): Relay | undefined {
    const relayUrl = parseRelayUrl(url);
    return relayUrl ? this.findRelay(relayUrl) : undefined;
  }

  private selectRelays(urls?: string[]): Relay[] {
    if (!urls) return [...this.relays];
    const wanted = new Set<string>();
    for (const url of urls) {
      const relayUrl = parseRelayUrl(url);
      if (relayUrl) wanted.add(relayUrl);
    }
    return this.relays.filter((r) => wanted.has(r.id));
  }

  private assertSubscriptionId(subscriptionId: string): void {
    if (!SubscriptionIdSchema.safeParse(subscriptionId).success) {
      throw new PoolError(
        `Invalid subscription id: ${JSON.stringify(subscriptionId)}`,
        'INVALID_SUBSCRIPTION_ID',
      );
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new PoolError('Relay pool is closed', 'POOL_CLOSED');
    }
  }
}

/**
 * Add a read/write relay, reporting failure instead of throwing.
 *
 * @returns `false` when the URL is invalid or already in the pool
 */
export function addRwRelay(pool: RelayPool, url: string): boolean {
  const relayUrl = parseRelayUrl(url);
  if (!relayUrl || pool.getRelay(relayUrl)) return false;
  pool.addRelay(relayUrl, RELAY_INFO_RW);
  return true;
}
