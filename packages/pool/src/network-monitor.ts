/**
 * Host reachability monitor.
 *
 * Polls the host's network interfaces and reports `satisfied` while any
 * non-internal interface carries an address, `unsatisfied` otherwise. The
 * listener only hears about changes; the first poll always reports.
 *
 * @module pool/network-monitor
 */
import { networkInterfaces, type NetworkInterfaceInfo } from 'node:os';
import type { NetworkMonitorLike, NetworkStatus, NetworkStatusListener } from './types.js';

export type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>;

export interface NetworkMonitorOptions {
  /** Poll period in ms. */
  pollIntervalMs?: number;
  /** Interface source. Defaults to `os.networkInterfaces`. */
  readInterfaces?: () => InterfaceTable;
}

const DEFAULT_POLL_INTERVAL_MS = 5_000;

/** Derive reachability from an interface table. */
export function deriveNetworkStatus(table: InterfaceTable): NetworkStatus {
  for (const name of Object.keys(table)) {
    for (const net of table[name] ?? []) {
      if (!net.internal && net.address) return 'satisfied';
    }
  }
  return 'unsatisfied';
}

export class NetworkMonitor implements NetworkMonitorLike {
  private timer: ReturnType<typeof setInterval> | null = null;
  private listener: NetworkStatusListener | null = null;
  private lastStatus: NetworkStatus | null = null;
  private readonly pollIntervalMs: number;
  private readonly readInterfaces: () => InterfaceTable;

  constructor(options: NetworkMonitorOptions = {}) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.readInterfaces = options.readInterfaces ?? networkInterfaces;
  }

  /** Begin polling. Polls once immediately. Calling start twice is a no-op. */
  start(listener: NetworkStatusListener): void {
    if (this.timer) return;
    this.listener = listener;
    this.lastStatus = null;
    this.poll();
    this.timer = setInterval(() => this.poll(), this.pollIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.listener = null;
  }

  /** Current status as of the last poll, or null before the first one. */
  get status(): NetworkStatus | null {
    return this.lastStatus;
  }

  /** Read the interfaces once and notify the listener if the status changed. */
  poll(): void {
    const next = deriveNetworkStatus(this.readInterfaces());
    if (next === this.lastStatus) return;
    this.lastStatus = next;
    this.listener?.(next);
  }
}
