/**
 * Run-to-completion serial context.
 *
 * Every mutation of pool state goes through one SerialQueue. A task runs to
 * completion before the next starts; tasks posted while one is running are
 * queued and drained in FIFO order afterwards. Synchronous only: no task
 * awaits, so no interleaving can happen between steps of a task.
 *
 * @module pool/serial-queue
 */
import type { PoolLogger } from './types.js';

export type SerialTask = () => void;

export class SerialQueue {
  private readonly mailbox: SerialTask[] = [];
  private active = false;

  constructor(private readonly logger: PoolLogger) {}

  /** Whether a task is currently running. */
  get isActive(): boolean {
    return this.active;
  }

  /** Tasks waiting behind the running one. */
  get pending(): number {
    return this.mailbox.length;
  }

  /**
   * Run `fn` inside the serial context and return its result.
   *
   * If the context is already active (a nested call from a running task),
   * `fn` runs inline. Otherwise `fn` runs immediately, and any tasks posted
   * meanwhile are drained before this call returns. Errors thrown by `fn`
   * propagate to the caller.
   */
  run<T>(fn: () => T): T {
    if (this.active) return fn();
    this.active = true;
    try {
      return fn();
    } finally {
      this.drain();
    }
  }

  /**
   * Schedule a task. Runs immediately when the context is idle, otherwise
   * after the running task and everything queued before it.
   *
   * Errors thrown by posted tasks are logged; they never reach the poster.
   */
  post(task: SerialTask): void {
    if (this.active) {
      this.mailbox.push(task);
      return;
    }
    this.run(() => this.execute(task));
  }

  private drain(): void {
    try {
      let task = this.mailbox.shift();
      while (task) {
        this.execute(task);
        task = this.mailbox.shift();
      }
    } finally {
      this.active = false;
    }
  }

  private execute(task: SerialTask): void {
    try {
      task();
    } catch (err) {
      this.logger.error('serial task failed:', err);
    }
  }
}
