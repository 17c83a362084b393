import { describe, it, expect } from 'vitest';
import {
  normalizeRelayUrl,
  parseRelayUrl,
  RelayInfoSchema,
  RELAY_INFO_RW,
  NostrRequestSchema,
  NostrFilterSchema,
  RelayMessageSchema,
} from '../relay-schemas.js';

describe('normalizeRelayUrl', () => {
  it('lowercases scheme and host', () => {
    expect(normalizeRelayUrl('WSS://Relay.Example.COM')).toBe('wss://relay.example.com');
  });

  it('strips a lone trailing slash', () => {
    expect(normalizeRelayUrl('wss://relay.example.com/')).toBe('wss://relay.example.com');
  });

  it('keeps a non-root path and query', () => {
    expect(normalizeRelayUrl('wss://relay.example.com/inbox?x=1')).toBe(
      'wss://relay.example.com/inbox?x=1',
    );
  });

  it('drops default ports and fragments', () => {
    expect(normalizeRelayUrl('wss://relay.example.com:443/#top')).toBe('wss://relay.example.com');
    expect(normalizeRelayUrl('ws://relay.example.com:80')).toBe('ws://relay.example.com');
  });

  it('keeps non-default ports', () => {
    expect(normalizeRelayUrl('ws://localhost:7777')).toBe('ws://localhost:7777');
  });

  it('trims surrounding whitespace', () => {
    expect(normalizeRelayUrl('  wss://relay.example.com  ')).toBe('wss://relay.example.com');
  });

  it('rejects non-websocket schemes', () => {
    expect(normalizeRelayUrl('https://relay.example.com')).toBeNull();
  });

  it('rejects strings that are not URLs', () => {
    expect(normalizeRelayUrl('relay.example.com')).toBeNull();
    expect(normalizeRelayUrl('')).toBeNull();
  });
});

describe('parseRelayUrl', () => {
  it('returns the normalised URL', () => {
    expect(parseRelayUrl('wss://Relay.Example.com/')).toBe('wss://relay.example.com');
  });

  it('returns null for invalid input', () => {
    expect(parseRelayUrl('ftp://relay.example.com')).toBeNull();
  });
});

describe('RelayInfoSchema', () => {
  it('defaults to read/write', () => {
    expect(RelayInfoSchema.parse({})).toEqual({ read: true, write: true });
  });

  it('RELAY_INFO_RW is read/write', () => {
    expect(RELAY_INFO_RW).toEqual({ read: true, write: true });
  });
});

describe('NostrFilterSchema', () => {
  it('accepts tag filters', () => {
    const filter = NostrFilterSchema.parse({ kinds: [1], '#p': ['abc'], limit: 20 });
    expect(filter['#p']).toEqual(['abc']);
  });

  it('rejects negative kinds', () => {
    expect(() => NostrFilterSchema.parse({ kinds: [-1] })).toThrow();
  });
});

describe('NostrRequestSchema', () => {
  it('accepts a subscribe request', () => {
    const request = NostrRequestSchema.parse({
      type: 'subscribe',
      subscriptionId: 'home',
      filters: [{ kinds: [1] }],
    });
    expect(request.type).toBe('subscribe');
  });

  it('rejects subscription ids longer than 64 characters', () => {
    expect(() =>
      NostrRequestSchema.parse({ type: 'unsubscribe', subscriptionId: 'x'.repeat(65) }),
    ).toThrow();
  });

  it('rejects an empty subscription id', () => {
    expect(() => NostrRequestSchema.parse({ type: 'unsubscribe', subscriptionId: '' })).toThrow();
  });
});

describe('RelayMessageSchema', () => {
  it('accepts an ok message', () => {
    const message = RelayMessageSchema.parse({
      type: 'ok',
      eventId: 'e1',
      accepted: false,
      message: 'blocked: spam',
    });
    expect(message).toEqual({ type: 'ok', eventId: 'e1', accepted: false, message: 'blocked: spam' });
  });

  it('rejects unknown message types', () => {
    expect(() => RelayMessageSchema.parse({ type: 'auth', challenge: 'x' })).toThrow();
  });
});
