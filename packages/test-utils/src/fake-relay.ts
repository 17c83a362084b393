/**
 * In-process stand-ins for relay connections and the network monitor.
 *
 * FakeRelayConnection records what the pool asks of it and lets a test drive
 * transport state by hand; nothing touches a socket.
 *
 * @module test-utils/fake-relay
 */
import type { NostrEvent, NostrRequest, RelayMessage, RelayUrl } from '@tether/shared/relay-schemas';
import type {
  ConnectionEvent,
  ConnectionEventListener,
  ConnectionFactory,
  ConnectionStatus,
  NetworkMonitorLike,
  NetworkStatus,
  NetworkStatusListener,
  RelayConnection,
  TransportEvent,
} from '@tether/pool';

export class FakeRelayConnection implements RelayConnection {
  status: ConnectionStatus = 'disconnected';
  lastConnectionAttempt = 0;
  /** Requests delivered while connected, in order. */
  readonly sent: NostrRequest[] = [];
  connectCalls = 0;
  disconnectCalls = 0;
  reconnectCalls = 0;

  constructor(
    readonly url: RelayUrl,
    private readonly onEvent: ConnectionEventListener,
    private readonly now: () => number = Date.now,
  ) {}

  get isConnected(): boolean {
    return this.status === 'connected';
  }

  get isConnecting(): boolean {
    return this.status === 'connecting';
  }

  connect(): void {
    this.connectCalls++;
    this.beginAttempt();
  }

  disconnect(): void {
    this.disconnectCalls++;
    this.closeLocally();
  }

  reconnect(): void {
    this.reconnectCalls++;
    this.closeLocally();
    this.beginAttempt();
  }

  send(request: NostrRequest): void {
    if (!this.isConnected) {
      this.emitTransport({ type: 'error', error: new Error(`not connected: ${this.url}`) });
      return;
    }
    this.sent.push(request);
  }

  // --- Test drivers ---

  simulateConnected(): void {
    this.status = 'connected';
    this.emitTransport({ type: 'connected' });
  }

  simulateDisconnected(code = 1006, reason = 'connection lost'): void {
    this.status = 'disconnected';
    this.emitTransport({ type: 'disconnected', code, reason });
  }

  simulateError(error: Error): void {
    this.emitTransport({ type: 'error', error });
  }

  simulateMessage(message: RelayMessage): void {
    this.emit({ kind: 'message', message });
  }

  simulateEvent(subscriptionId: string, event: NostrEvent): void {
    this.simulateMessage({ type: 'event', subscriptionId, event });
  }

  private beginAttempt(): void {
    if (this.status !== 'disconnected') return;
    this.status = 'connecting';
    this.lastConnectionAttempt = this.now();
    this.emitTransport({ type: 'connecting' });
  }

  private closeLocally(): void {
    if (this.status === 'disconnected') return;
    this.status = 'disconnected';
    this.emitTransport({ type: 'disconnected', code: 1000, reason: 'client disconnect' });
  }

  private emitTransport(event: TransportEvent): void {
    this.emit({ kind: 'transport', event });
  }

  private emit(event: ConnectionEvent): void {
    this.onEvent(event);
  }
}

export interface FakeConnectionFactory {
  factory: (...args: Parameters<ConnectionFactory>) => FakeRelayConnection;
  /** Connections built so far, keyed by normalised relay URL. */
  connections: Map<string, FakeRelayConnection>;
  /**
   * Connection built for a URL.
   *
   * @throws Error when the pool never built one for it
   */
  get(url: string): FakeRelayConnection;
}

/**
 * ConnectionFactory that builds FakeRelayConnections and keeps them for
 * inspection.
 *
 * @param now - Clock stamped onto connect attempts
 */
export function createFakeConnectionFactory(now: () => number = Date.now): FakeConnectionFactory {
  const connections = new Map<string, FakeRelayConnection>();
  return {
    connections,
    factory: (url, onEvent) => {
      const connection = new FakeRelayConnection(url, onEvent, now);
      connections.set(url, connection);
      return connection;
    },
    get: (url) => {
      const connection = connections.get(url);
      if (!connection) throw new Error(`No connection built for ${url}`);
      return connection;
    },
  };
}

/** Network monitor driven by hand through `emit`. */
export class FakeNetworkMonitor implements NetworkMonitorLike {
  private listener: NetworkStatusListener | null = null;
  startCalls = 0;
  stopCalls = 0;

  get isRunning(): boolean {
    return this.listener !== null;
  }

  start(listener: NetworkStatusListener): void {
    this.startCalls++;
    this.listener = listener;
  }

  stop(): void {
    this.stopCalls++;
    this.listener = null;
  }

  emit(status: NetworkStatus): void {
    this.listener?.(status);
  }
}
