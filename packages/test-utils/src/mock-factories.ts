import { vi, type Mock } from 'vitest';
import {
  parseRelayUrl,
  type NostrEvent,
  type NostrFilter,
  type RelayUrl,
} from '@tether/shared/relay-schemas';

type LogFn = (...args: unknown[]) => void;

export interface MockLogger {
  debug: Mock<LogFn>;
  info: Mock<LogFn>;
  warn: Mock<LogFn>;
  error: Mock<LogFn>;
}

/** Create a logger with every level stubbed via `vi.fn()`. */
export function createMockLogger(): MockLogger {
  return {
    debug: vi.fn<LogFn>(),
    info: vi.fn<LogFn>(),
    warn: vi.fn<LogFn>(),
    error: vi.fn<LogFn>(),
  };
}

/** Create a NostrEvent with sensible defaults. */
export function createMockEvent(overrides: Partial<NostrEvent> = {}): NostrEvent {
  return {
    id: 'event-1',
    pubkey: 'pubkey-1',
    created_at: 1_700_000_000,
    kind: 1,
    tags: [],
    content: 'hello',
    sig: 'sig-1',
    ...overrides,
  };
}

/** Create a NostrFilter matching recent text notes. */
export function createMockFilter(overrides: Partial<NostrFilter> = {}): NostrFilter {
  return {
    kinds: [1],
    limit: 10,
    ...overrides,
  };
}

/**
 * Parse a relay URL for test fixtures.
 *
 * @throws Error when the input is not a ws:// or wss:// URL
 */
export function createRelayUrl(input: string): RelayUrl {
  const url = parseRelayUrl(input);
  if (!url) throw new Error(`Not a relay URL: ${input}`);
  return url;
}
