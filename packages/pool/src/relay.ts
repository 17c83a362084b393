/**
 * A single relay tracked by the pool: its descriptor, the connection it
 * exclusively owns, and the one-way `broken` latch.
 *
 * @module pool/relay
 */
import type { RelayDescriptor, RelayUrl } from '@tether/shared/relay-schemas';
import type { ConnectionStatus, RelayConnection } from './types.js';

export class Relay {
  readonly id: RelayUrl;
  readonly descriptor: RelayDescriptor;
  private broken = false;

  constructor(
    descriptor: RelayDescriptor,
    readonly connection: RelayConnection,
  ) {
    this.id = descriptor.url;
    this.descriptor = Object.freeze({
      url: descriptor.url,
      info: Object.freeze({ ...descriptor.info }),
    });
  }

  /** Broken relays are skipped by automatic reconnection. There is no way back. */
  get isBroken(): boolean {
    return this.broken;
  }

  markBroken(): void {
    this.broken = true;
  }

  get status(): ConnectionStatus {
    if (this.connection.isConnected) return 'connected';
    if (this.connection.isConnecting) return 'connecting';
    return 'disconnected';
  }
}
