/**
 * treepatch Core - Scheduler
 *
 * Non-blocking message channel between event listeners and the application.
 * `send` only enqueues; a microtask drains the queue in FIFO order.
 *
 * - A handler that throws is reported through `onError`; draining continues
 *   with the next message. An `onError` that throws as well is printed with
 *   console.error.
 * - One drain delivers at most MAX_DRAIN_BATCH messages, then yields to a
 *   fresh microtask so a handler that keeps sending cannot starve the host.
 */

import type { MessageSink } from './events.js';
import { MAX_DRAIN_BATCH } from './symbols.js';

export type MessageHandler<Msg> = (msg: Msg) => void;

export interface MessageQueueOptions {
  /** Called with whatever a handler throws. Defaults to console.error */
  onError?: (error: unknown) => void;
  /** Messages per drain before yielding (defaults to MAX_DRAIN_BATCH) */
  batchSize?: number;
}

export class MessageQueue<Msg> implements MessageSink<Msg> {
  private readonly queue: Msg[] = [];
  private head = 0;
  private pending = false;
  private idle: Array<() => void> = [];
  private readonly onError: (error: unknown) => void;
  private readonly batchSize: number;

  constructor(
    private readonly handler: MessageHandler<Msg>,
    options: MessageQueueOptions = {}
  ) {
    this.onError = options.onError ?? ((error) => console.error('treepatch: message handler threw:', error));
    this.batchSize = Math.max(1, options.batchSize ?? MAX_DRAIN_BATCH);
  }

  send(msg: Msg): void {
    this.queue.push(msg);
    this.schedule();
  }

  /** Messages waiting to be delivered */
  get size(): number {
    return this.queue.length - this.head;
  }

  /**
   * Resolves once the queue is empty, including messages sent by handlers
   * while draining.
   */
  settled(): Promise<void> {
    if (this.size === 0 && !this.pending) return Promise.resolve();
    return new Promise((resolve) => this.idle.push(resolve));
  }

  private schedule(): void {
    if (this.pending) return;
    this.pending = true;
    queueMicrotask(() => this.drain());
  }

  private report(error: unknown): void {
    try {
      this.onError(error);
    } catch (failure) {
      console.error('treepatch: error handler threw:', failure, 'while reporting:', error);
    }
  }

  private drain(): void {
    this.pending = false;
    let delivered = 0;

    while (this.head < this.queue.length) {
      if (delivered >= this.batchSize) {
        this.schedule();
        return;
      }
      const msg = this.queue[this.head++];
      delivered++;
      try {
        this.handler(msg);
      } catch (error) {
        this.report(error);
      }
    }

    this.queue.length = 0;
    this.head = 0;

    const idle = this.idle;
    this.idle = [];
    for (const resolve of idle) resolve();
  }
}
