/**
 * Bounded outbound request queue.
 *
 * Holds requests addressed to relays that were not connected at send time.
 * Entries for all relays share one FIFO list; the bound is per relay, and
 * admission beyond it is refused rather than evicting older entries.
 *
 * @module pool/request-queue
 */
import type { NostrRequest, RelayUrl } from '@tether/shared/relay-schemas';

/** Default per-relay capacity. */
export const MAX_QUEUED_PER_RELAY = 10;

export interface QueuedRequest {
  request: NostrRequest;
  relay: RelayUrl;
}

/** Outcome of an enqueue attempt; `depth` is the relay's queue length afterwards. */
export type EnqueueResult =
  | { queued: true; depth: number }
  | { queued: false; reason: 'queue_full'; depth: number };

export class RequestQueue {
  private queue: QueuedRequest[] = [];

  constructor(private readonly capacity: number = MAX_QUEUED_PER_RELAY) {}

  /** Number of requests waiting for the given relay. */
  countFor(relay: RelayUrl): number {
    let count = 0;
    for (const entry of this.queue) {
      if (entry.relay === relay) count++;
    }
    return count;
  }

  /**
   * Append a request for a relay, unless that relay is already at capacity.
   *
   * @param request - The request to hold
   * @param relay - Target relay
   */
  enqueue(request: NostrRequest, relay: RelayUrl): EnqueueResult {
    const depth = this.countFor(relay);
    if (depth >= this.capacity) {
      return { queued: false, reason: 'queue_full', depth };
    }
    this.queue.push({ request, relay });
    return { queued: true, depth: depth + 1 };
  }

  /**
   * Remove and return every entry for a relay, oldest first.
   *
   * Entries for other relays keep their relative order.
   *
   * @param relay - The relay whose backlog should be released
   */
  flush(relay: RelayUrl): QueuedRequest[] {
    const matched: QueuedRequest[] = [];
    const kept: QueuedRequest[] = [];
    for (const entry of this.queue) {
      (entry.relay === relay ? matched : kept).push(entry);
    }
    this.queue = kept;
    return matched;
  }

  /**
   * Drop every entry for a relay without sending it.
   *
   * @returns The number of entries dropped
   */
  purge(relay: RelayUrl): number {
    return this.flush(relay).length;
  }

  get size(): number {
    return this.queue.length;
  }

  /** Snapshot of all queued entries in FIFO order. */
  entries(): QueuedRequest[] {
    return [...this.queue];
  }
}
