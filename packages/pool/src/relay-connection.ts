/**
 * WebSocket transport for a single relay, built on `ws`.
 *
 * Every lifecycle change and every decoded inbound frame is reported through
 * the event listener given at construction. Nothing here throws or returns a
 * promise; failures surface as transport `error` events.
 *
 * @module pool/relay-connection
 */
import WebSocket from 'ws';
import { decodeMessage, describeRequest, encodeRequest } from '@tether/shared/relay-codec';
import type { NostrRequest, RelayUrl } from '@tether/shared/relay-schemas';
import type {
  ConnectionEvent,
  ConnectionEventListener,
  ConnectionFactory,
  ConnectionStatus,
  PoolLogger,
  RelayConnection,
  TransportEvent,
} from './types.js';

/** Close code and reason used for client-initiated disconnects. */
export const CLIENT_CLOSE_CODE = 1000;
export const CLIENT_CLOSE_REASON = 'client disconnect';

export interface WebSocketRelayConnectionOptions {
  logger?: PoolLogger;
  now?: () => number;
}

const noop = (): void => {};
const silentLogger: PoolLogger = { debug: noop, info: noop, warn: noop, error: noop };

/** Decode a `ws` payload as UTF-8 text. */
export function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

export class WebSocketRelayConnection implements RelayConnection {
  private socket: WebSocket | null = null;
  private state: ConnectionStatus = 'disconnected';
  private attemptStartedAt = 0;
  private readonly logger: PoolLogger;
  private readonly now: () => number;

  constructor(
    readonly url: RelayUrl,
    private readonly onEvent: ConnectionEventListener,
    options: WebSocketRelayConnectionOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  get isConnected(): boolean {
    return this.state === 'connected';
  }

  get isConnecting(): boolean {
    return this.state === 'connecting';
  }

  get lastConnectionAttempt(): number {
    return this.attemptStartedAt;
  }

  connect(): void {
    if (this.socket) return;

    this.attemptStartedAt = this.now();
    this.state = 'connecting';
    const socket = new WebSocket(this.url);
    this.socket = socket;
    this.emitTransport({ type: 'connecting' });

    socket.on('open', () => {
      if (this.socket !== socket) return;
      this.state = 'connected';
      this.emitTransport({ type: 'connected' });
    });

    socket.on('message', (data: WebSocket.RawData) => {
      if (this.socket !== socket) return;
      const raw = rawDataToString(data);
      const message = decodeMessage(raw);
      if (!message) {
        this.logger.debug(`dropping undecodable frame from ${this.url}:`, raw.slice(0, 200));
        return;
      }
      this.emit({ kind: 'message', message });
    });

    socket.on('close', (code: number, reason: Buffer) => {
      if (this.socket !== socket) return;
      this.socket = null;
      this.state = 'disconnected';
      this.emitTransport({ type: 'disconnected', code, reason: reason.toString('utf8') });
    });

    // Listener stays attached after the socket is superseded: ws throws on
    // an 'error' event nobody listens to.
    socket.on('error', (error: Error) => {
      if (this.socket !== socket) return;
      this.emitTransport({ type: 'error', error });
    });
  }

  disconnect(): void {
    const socket = this.socket;
    if (!socket) return;

    this.socket = null;
    this.state = 'disconnected';
    socket.close(CLIENT_CLOSE_CODE, CLIENT_CLOSE_REASON);
    this.emitTransport({ type: 'disconnected', code: CLIENT_CLOSE_CODE, reason: CLIENT_CLOSE_REASON });
  }

  reconnect(): void {
    this.disconnect();
    this.connect();
  }

  send(request: NostrRequest): void {
    const socket = this.socket;
    if (!socket || this.state !== 'connected') {
      this.emitTransport({
        type: 'error',
        error: new Error(`Cannot send ${describeRequest(request)} to ${this.url}: not connected`),
      });
      return;
    }

    socket.send(encodeRequest(request), (err) => {
      if (err && this.socket === socket) {
        this.emitTransport({ type: 'error', error: err });
      }
    });
  }

  private emitTransport(event: TransportEvent): void {
    this.emit({ kind: 'transport', event });
  }

  private emit(event: ConnectionEvent): void {
    this.onEvent(event);
  }
}

/** ConnectionFactory producing {@link WebSocketRelayConnection}s. */
export function createWebSocketConnectionFactory(
  options: WebSocketRelayConnectionOptions = {},
): ConnectionFactory {
  return (url, onEvent) => new WebSocketRelayConnection(url, onEvent, options);
}
