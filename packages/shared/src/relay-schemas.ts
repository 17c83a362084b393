/**
 * Zod schemas for the relay protocol model.
 *
 * Defines relay URLs, relay capability info, subscription filters, events,
 * outbound requests and inbound relay messages. The pool only ever reads an
 * event's `id`; every other event field is carried through untouched.
 *
 * @module shared/relay-schemas
 */
import { z } from 'zod';

// === Relay URL ===

const RELAY_PROTOCOLS = new Set(['ws:', 'wss:']);

/**
 * Normalise a relay URL so that equivalent spellings share one key.
 *
 * Lowercases scheme and host, drops default ports, credentials and fragments,
 * and strips a lone trailing `/`. Returns null for anything that is not an
 * absolute `ws://` or `wss://` URL.
 *
 * @param input - Raw URL as typed by a user or read from config
 */
export function normalizeRelayUrl(input: string): string | null {
  let url: URL;
  try {
    url = new URL(input.trim());
  } catch {
    return null;
  }

  if (!RELAY_PROTOCOLS.has(url.protocol) || !url.host) return null;

  const path = url.pathname === '/' ? '' : url.pathname;
  return `${url.protocol}//${url.host}${path}${url.search}`;
}

export const RelayUrlSchema = z
  .string()
  .transform((value, ctx) => {
    const normalized = normalizeRelayUrl(value);
    if (normalized === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Expected a ws:// or wss:// URL',
      });
      return z.NEVER;
    }
    return normalized;
  })
  .brand<'RelayUrl'>();

export type RelayUrl = z.infer<typeof RelayUrlSchema>;

/**
 * Parse and normalise a relay URL.
 *
 * @param input - Raw URL string
 * @returns The branded URL, or null when the input is not a relay URL
 */
export function parseRelayUrl(input: string): RelayUrl | null {
  const result = RelayUrlSchema.safeParse(input);
  return result.success ? result.data : null;
}

// === Relay Info ===

export const RelayInfoSchema = z.object({
  read: z.boolean().default(true),
  write: z.boolean().default(true),
});

export type RelayInfo = z.infer<typeof RelayInfoSchema>;

/** Read/write relay, the default for relays added without explicit info. */
export const RELAY_INFO_RW: Readonly<RelayInfo> = Object.freeze({ read: true, write: true });

/** Immutable address and capabilities of a relay in the pool. */
export interface RelayDescriptor {
  readonly url: RelayUrl;
  readonly info: Readonly<RelayInfo>;
}

// === Filters & Events ===

/** Subscription ids are opaque caller strings; relays cap them at 64 chars. */
export const SubscriptionIdSchema = z.string().min(1).max(64);

const TagValuesSchema = z.array(z.string()).optional();

export const NostrFilterSchema = z.object({
  ids: z.array(z.string()).optional(),
  authors: z.array(z.string()).optional(),
  kinds: z.array(z.number().int().min(0)).optional(),
  '#e': TagValuesSchema,
  '#p': TagValuesSchema,
  '#t': TagValuesSchema,
  '#d': TagValuesSchema,
  since: z.number().int().optional(),
  until: z.number().int().optional(),
  limit: z.number().int().min(0).optional(),
  search: z.string().optional(),
});

export type NostrFilter = z.infer<typeof NostrFilterSchema>;

export const NostrEventSchema = z.object({
  id: z.string().min(1),
  pubkey: z.string(),
  created_at: z.number().int(),
  kind: z.number().int().min(0),
  tags: z.array(z.array(z.string())),
  content: z.string(),
  sig: z.string(),
});

export type NostrEvent = z.infer<typeof NostrEventSchema>;

// === Outbound Requests ===

export const NostrRequestSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('subscribe'),
    subscriptionId: SubscriptionIdSchema,
    filters: z.array(NostrFilterSchema),
  }),
  z.object({
    type: z.literal('unsubscribe'),
    subscriptionId: SubscriptionIdSchema,
  }),
  z.object({
    type: z.literal('event'),
    event: NostrEventSchema,
  }),
]);

export type NostrRequest = z.infer<typeof NostrRequestSchema>;

// === Inbound Messages ===

export const RelayMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('event'),
    subscriptionId: z.string(),
    event: NostrEventSchema,
  }),
  z.object({
    type: z.literal('eose'),
    subscriptionId: z.string(),
  }),
  z.object({
    type: z.literal('notice'),
    message: z.string(),
  }),
  z.object({
    type: z.literal('ok'),
    eventId: z.string(),
    accepted: z.boolean(),
    message: z.string(),
  }),
  z.object({
    type: z.literal('closed'),
    subscriptionId: z.string(),
    message: z.string(),
  }),
]);

export type RelayMessage = z.infer<typeof RelayMessageSchema>;
