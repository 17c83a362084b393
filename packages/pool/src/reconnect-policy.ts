/**
 * Pure reconnection decisions.
 *
 * Given a relay's state and the current time, decide whether a
 * reconciliation pass should leave it alone, ask it to connect, or tear
 * down a stuck attempt and start over.
 *
 * @module pool/reconnect-policy
 */
import type { ConnectionStatus, NetworkStatus } from './types.js';

/** A `connecting` relay older than this is considered stuck. */
export const STALE_CONNECTION_MS = 5_000;

export type ReconnectAction = 'skip' | 'connect' | 'reconnect';

export interface RelayReconnectState {
  status: ConnectionStatus;
  isBroken: boolean;
  /** Epoch ms of the latest connect attempt (0 if never). */
  lastConnectionAttempt: number;
}

/**
 * Decide what a reconciliation pass should do with one relay.
 *
 * Broken relays are always skipped, whatever their transport state.
 * Connected relays and fresh connect attempts are skipped too.
 *
 * @param state - The relay's current state
 * @param now - Current epoch ms
 * @param staleMs - Age after which a connect attempt is stale
 */
export function planReconnect(
  state: RelayReconnectState,
  now: number,
  staleMs: number = STALE_CONNECTION_MS,
): ReconnectAction {
  if (state.isBroken) return 'skip';
  switch (state.status) {
    case 'connected':
      return 'skip';
    case 'connecting':
      return now - state.lastConnectionAttempt > staleMs ? 'reconnect' : 'skip';
    case 'disconnected':
      return 'connect';
  }
}

/** Statuses in which the host can reach the network. */
export function isReachable(status: NetworkStatus): boolean {
  return status === 'satisfied' || status === 'requires-connection';
}

/**
 * Whether a reachability change should trigger reconciliation.
 *
 * Fires only on a transition into a reachable status from a different one,
 * so repeated identical updates do nothing.
 */
export function shouldReconcile(previous: NetworkStatus, next: NetworkStatus): boolean {
  return next !== previous && isReachable(next);
}
