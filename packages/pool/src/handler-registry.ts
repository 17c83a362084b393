/**
 * Subscription handler registry.
 *
 * Keyed by subscription id for registration dedup only: the first handler
 * registered under an id wins and later registrations are ignored. Delivery
 * is not filtered by id.
 *
 * @module pool/handler-registry
 */
import type { RelayEventHandler } from './types.js';

export interface SubscriptionHandler {
  subscriptionId: string;
  callback: RelayEventHandler;
}

export class HandlerRegistry {
  private readonly handlers = new Map<string, RelayEventHandler>();

  /**
   * Register a handler unless one already exists for the id.
   *
   * @returns `true` if the handler was added, `false` if the id was taken
   */
  register(subscriptionId: string, callback: RelayEventHandler): boolean {
    if (this.handlers.has(subscriptionId)) return false;
    this.handlers.set(subscriptionId, callback);
    return true;
  }

  /** @returns `true` if a handler was registered under the id */
  remove(subscriptionId: string): boolean {
    return this.handlers.delete(subscriptionId);
  }

  has(subscriptionId: string): boolean {
    return this.handlers.has(subscriptionId);
  }

  get(subscriptionId: string): RelayEventHandler | undefined {
    return this.handlers.get(subscriptionId);
  }

  get size(): number {
    return this.handlers.size;
  }

  /**
   * Snapshot of all handlers in registration order.
   *
   * Callers iterate the snapshot, so a handler may register or remove
   * handlers while being invoked.
   */
  list(): SubscriptionHandler[] {
    return Array.from(this.handlers, ([subscriptionId, callback]) => ({ subscriptionId, callback }));
  }
}
