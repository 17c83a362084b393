import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { createMockLogger, createRelayUrl, type MockLogger } from '@tether/test-utils';
import {
  WebSocketRelayConnection,
  createWebSocketConnectionFactory,
  rawDataToString,
} from '../relay-connection.js';
import type { ConnectionEvent } from '../types.js';

// ---------------------------------------------------------------------------
// ws mock
// ---------------------------------------------------------------------------

const socketMock = vi.hoisted(() => {
  type Listener = (...args: unknown[]) => void;

  class FakeSocket {
    static instances: FakeSocket[] = [];
    readonly listeners = new Map<string, Listener[]>();
    readonly sent: string[] = [];
    closedWith: { code?: number; reason?: string } | null = null;
    sendError: Error | undefined = undefined;

    constructor(readonly url: string) {
      FakeSocket.instances.push(this);
    }

    on(event: string, listener: Listener): this {
      const existing = this.listeners.get(event) ?? [];
      existing.push(listener);
      this.listeners.set(event, existing);
      return this;
    }

    send(data: string, cb?: (err?: Error) => void): void {
      this.sent.push(data);
      cb?.(this.sendError);
    }

    close(code?: number, reason?: string): void {
      this.closedWith = { code, reason };
    }

    fire(event: string, ...args: unknown[]): void {
      for (const listener of this.listeners.get(event) ?? []) listener(...args);
    }
  }

  return { FakeSocket };
});

vi.mock('ws', () => ({ default: socketMock.FakeSocket }));

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const RELAY_URL = createRelayUrl('wss://relay.example');

let onEvent: Mock<(event: ConnectionEvent) => void>;
let logger: MockLogger;
let clock: number;

function createConnection(): WebSocketRelayConnection {
  return new WebSocketRelayConnection(RELAY_URL, onEvent, { logger, now: () => clock });
}

function lastSocket(): InstanceType<typeof socketMock.FakeSocket> {
  const socket = socketMock.FakeSocket.instances.at(-1);
  if (!socket) throw new Error('no socket created');
  return socket;
}

function events(): ConnectionEvent[] {
  return onEvent.mock.calls.map(([event]) => event);
}

function lastErrorMessage(): string | null {
  const last = onEvent.mock.lastCall?.[0];
  if (last?.kind === 'transport' && last.event.type === 'error') return last.event.error.message;
  return null;
}

beforeEach(() => {
  socketMock.FakeSocket.instances.length = 0;
  onEvent = vi.fn<(event: ConnectionEvent) => void>();
  logger = createMockLogger();
  clock = 10_000;
});

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

describe('connect', () => {
  it('opens a socket to the relay URL and reports connecting', () => {
    const connection = createConnection();

    connection.connect();

    expect(lastSocket().url).toBe('wss://relay.example');
    expect(connection.isConnecting).toBe(true);
    expect(connection.lastConnectionAttempt).toBe(10_000);
    expect(events()).toEqual([{ kind: 'transport', event: { type: 'connecting' } }]);
  });

  it('reports connected once the socket opens', () => {
    const connection = createConnection();
    connection.connect();

    lastSocket().fire('open');

    expect(connection.isConnected).toBe(true);
    expect(onEvent).toHaveBeenLastCalledWith({ kind: 'transport', event: { type: 'connected' } });
  });

  it('does nothing while a socket already exists', () => {
    const connection = createConnection();
    connection.connect();
    connection.connect();

    expect(socketMock.FakeSocket.instances).toHaveLength(1);
  });

  it('reports a server-side close with its code and reason', () => {
    const connection = createConnection();
    connection.connect();
    lastSocket().fire('open');

    lastSocket().fire('close', 1006, Buffer.from('gone away'));

    expect(connection.isConnected).toBe(false);
    expect(connection.isConnecting).toBe(false);
    expect(onEvent).toHaveBeenLastCalledWith({
      kind: 'transport',
      event: { type: 'disconnected', code: 1006, reason: 'gone away' },
    });
  });

  it('opens a fresh socket after the previous one closed', () => {
    const connection = createConnection();
    connection.connect();
    lastSocket().fire('close', 1006, Buffer.from(''));

    clock = 20_000;
    connection.connect();

    expect(socketMock.FakeSocket.instances).toHaveLength(2);
    expect(connection.lastConnectionAttempt).toBe(20_000);
  });

  it('forwards socket errors as transport errors', () => {
    const connection = createConnection();
    connection.connect();
    const error = new Error('ECONNREFUSED');

    lastSocket().fire('error', error);

    expect(onEvent).toHaveBeenLastCalledWith({ kind: 'transport', event: { type: 'error', error } });
  });
});

describe('disconnect', () => {
  it('closes the socket with code 1000 and reports it', () => {
    const connection = createConnection();
    connection.connect();
    const socket = lastSocket();
    socket.fire('open');

    connection.disconnect();

    expect(socket.closedWith).toEqual({ code: 1000, reason: 'client disconnect' });
    expect(connection.isConnected).toBe(false);
    expect(onEvent).toHaveBeenLastCalledWith({
      kind: 'transport',
      event: { type: 'disconnected', code: 1000, reason: 'client disconnect' },
    });
  });

  it('ignores events from the superseded socket', () => {
    const connection = createConnection();
    connection.connect();
    const socket = lastSocket();
    connection.disconnect();
    const before = onEvent.mock.calls.length;

    socket.fire('open');
    socket.fire('close', 1000, Buffer.from('client disconnect'));

    expect(onEvent.mock.calls.length).toBe(before);
    expect(connection.isConnected).toBe(false);
  });

  it('is a no-op without a socket', () => {
    const connection = createConnection();

    connection.disconnect();

    expect(onEvent).not.toHaveBeenCalled();
  });
});

describe('reconnect', () => {
  it('closes the current socket and starts a new attempt', () => {
    const connection = createConnection();
    connection.connect();
    const first = lastSocket();
    onEvent.mockClear();

    clock = 30_000;
    connection.reconnect();

    expect(first.closedWith).toEqual({ code: 1000, reason: 'client disconnect' });
    expect(lastSocket()).not.toBe(first);
    expect(connection.lastConnectionAttempt).toBe(30_000);
    expect(events()).toEqual([
      { kind: 'transport', event: { type: 'disconnected', code: 1000, reason: 'client disconnect' } },
      { kind: 'transport', event: { type: 'connecting' } },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Frames
// ---------------------------------------------------------------------------

describe('inbound frames', () => {
  it('decodes relay messages', () => {
    const connection = createConnection();
    connection.connect();

    lastSocket().fire('message', Buffer.from('["EOSE","sub-1"]'));

    expect(onEvent).toHaveBeenLastCalledWith({
      kind: 'message',
      message: { type: 'eose', subscriptionId: 'sub-1' },
    });
  });

  it('drops undecodable frames with a debug log', () => {
    const connection = createConnection();
    connection.connect();
    onEvent.mockClear();

    lastSocket().fire('message', Buffer.from('["PING"]'));

    expect(onEvent).not.toHaveBeenCalled();
    expect(logger.debug).toHaveBeenCalledWith(
      'dropping undecodable frame from wss://relay.example:',
      '["PING"]',
    );
  });
});

describe('send', () => {
  it('writes the encoded frame while connected', () => {
    const connection = createConnection();
    connection.connect();
    lastSocket().fire('open');

    connection.send({ type: 'unsubscribe', subscriptionId: 'sub-1' });

    expect(lastSocket().sent).toEqual(['["CLOSE","sub-1"]']);
  });

  it('reports an error instead of writing while not connected', () => {
    const connection = createConnection();
    connection.connect();

    connection.send({ type: 'unsubscribe', subscriptionId: 'sub-1' });

    expect(lastSocket().sent).toEqual([]);
    expect(lastErrorMessage()).toBe('Cannot send CLOSE sub-1 to wss://relay.example: not connected');
  });

  it('reports write failures from the socket', () => {
    const connection = createConnection();
    connection.connect();
    lastSocket().fire('open');
    lastSocket().sendError = new Error('write EPIPE');

    connection.send({ type: 'unsubscribe', subscriptionId: 'sub-1' });

    expect(lastErrorMessage()).toBe('write EPIPE');
  });
});

// ---------------------------------------------------------------------------
// Helpers under test
// ---------------------------------------------------------------------------

describe('rawDataToString', () => {
  it('decodes buffers, fragmented buffers and array buffers', () => {
    const arrayBuffer = new ArrayBuffer(3);
    new Uint8Array(arrayBuffer).set([97, 98, 99]);

    expect(rawDataToString(Buffer.from('abc'))).toBe('abc');
    expect(rawDataToString([Buffer.from('ab'), Buffer.from('c')])).toBe('abc');
    expect(rawDataToString(arrayBuffer)).toBe('abc');
  });
});

describe('createWebSocketConnectionFactory', () => {
  it('builds connections bound to the given URL', () => {
    const factory = createWebSocketConnectionFactory({ logger });

    const connection = factory(RELAY_URL, onEvent);

    expect(connection).toBeInstanceOf(WebSocketRelayConnection);
    expect(connection.url).toBe('wss://relay.example');
  });
});
