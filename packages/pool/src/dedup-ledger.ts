/**
 * Dedup ledger for content events.
 *
 * Remembers every (relay, event id) pair seen and counts distinct ids per
 * relay. Bookkeeping only: the pool still delivers duplicates to handlers.
 *
 * @module pool/dedup-ledger
 */
import type { RelayUrl } from '@tether/shared/relay-schemas';

/**
 * Composite ledger key. Relay URLs never contain a raw space, so the
 * separator keeps keys from different relays apart.
 */
export function dedupKey(relay: RelayUrl, itemId: string): string {
  return `${relay} ${itemId}`;
}

export class DedupLedger {
  private readonly seen = new Set<string>();
  private readonly counts = new Map<RelayUrl, number>();

  /**
   * Record an item seen on a relay.
   *
   * @returns `true` the first time the pair is seen, `false` for repeats
   */
  record(relay: RelayUrl, itemId: string): boolean {
    const key = dedupKey(relay, itemId);
    if (this.seen.has(key)) return false;
    this.seen.add(key);
    this.counts.set(relay, (this.counts.get(relay) ?? 0) + 1);
    return true;
  }

  has(relay: RelayUrl, itemId: string): boolean {
    return this.seen.has(dedupKey(relay, itemId));
  }

  /** Distinct items received from a relay. */
  receivedCount(relay: RelayUrl): number {
    return this.counts.get(relay) ?? 0;
  }

  get size(): number {
    return this.seen.size;
  }

  countsByRelay(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }
}
