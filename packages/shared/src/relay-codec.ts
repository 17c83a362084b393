/**
 * NIP-01 JSON frame codec.
 *
 * Outbound requests become `REQ` / `CLOSE` / `EVENT` arrays; inbound frames
 * (`EVENT`, `EOSE`, `NOTICE`, `OK`, `CLOSED`) are validated with zod and
 * turned into {@link RelayMessage} values. Anything else decodes to null.
 *
 * @module shared/relay-codec
 */
import { z } from 'zod';
import { NostrEventSchema } from './relay-schemas.js';
import type { NostrRequest, RelayMessage } from './relay-schemas.js';

const EventFrameSchema = z.tuple([z.literal('EVENT'), z.string(), NostrEventSchema]);
const EoseFrameSchema = z.tuple([z.literal('EOSE'), z.string()]);
const NoticeFrameSchema = z.tuple([z.literal('NOTICE'), z.string()]);
const OkFrameSchema = z.tuple([z.literal('OK'), z.string(), z.boolean(), z.string()]);
const ClosedFrameSchema = z.tuple([z.literal('CLOSED'), z.string(), z.string()]);

/**
 * Serialise an outbound request into a NIP-01 frame.
 *
 * @param request - The request to encode
 */
export function encodeRequest(request: NostrRequest): string {
  switch (request.type) {
    case 'subscribe':
      return JSON.stringify(['REQ', request.subscriptionId, ...request.filters]);
    case 'unsubscribe':
      return JSON.stringify(['CLOSE', request.subscriptionId]);
    case 'event':
      return JSON.stringify(['EVENT', request.event]);
  }
}

/**
 * Decode an inbound NIP-01 frame.
 *
 * @param raw - The text frame received from a relay
 * @returns The decoded message, or null for malformed or unsupported frames
 */
export function decodeMessage(raw: string): RelayMessage | null {
  let frame: unknown;
  try {
    frame = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!Array.isArray(frame)) return null;

  switch (frame[0]) {
    case 'EVENT': {
      const parsed = EventFrameSchema.safeParse(frame);
      if (!parsed.success) return null;
      const [, subscriptionId, event] = parsed.data;
      return { type: 'event', subscriptionId, event };
    }
    case 'EOSE': {
      const parsed = EoseFrameSchema.safeParse(frame);
      return parsed.success ? { type: 'eose', subscriptionId: parsed.data[1] } : null;
    }
    case 'NOTICE': {
      const parsed = NoticeFrameSchema.safeParse(frame);
      return parsed.success ? { type: 'notice', message: parsed.data[1] } : null;
    }
    case 'OK': {
      const parsed = OkFrameSchema.safeParse(frame);
      if (!parsed.success) return null;
      const [, eventId, accepted, message] = parsed.data;
      return { type: 'ok', eventId, accepted, message };
    }
    case 'CLOSED': {
      const parsed = ClosedFrameSchema.safeParse(frame);
      if (!parsed.success) return null;
      const [, subscriptionId, message] = parsed.data;
      return { type: 'closed', subscriptionId, message };
    }
    default:
      return null;
  }
}

/** Short human-readable label for a request, used in log lines. */
export function describeRequest(request: NostrRequest): string {
  switch (request.type) {
    case 'subscribe':
      return `REQ ${request.subscriptionId}`;
    case 'unsubscribe':
      return `CLOSE ${request.subscriptionId}`;
    case 'event':
      return `EVENT ${request.event.id}`;
  }
}
