import { describeError, logger } from './logger.js';

/**
 * One-way queue from background tasks to a consumer.
 *
 * `post` never invokes the consumer directly: events are buffered and
 * delivered in FIFO order on a later turn of the event loop.
 */
export class EventChannel<E> {
  private buffer: E[] = [];
  private scheduled = false;
  private flushWaiters: Array<() => void> = [];

  constructor(private readonly deliver: (event: E) => void) {}

  post(event: E): void {
    this.buffer.push(event);
    this.schedule();
  }

  get pending(): number {
    return this.buffer.length;
  }

  /**
   * Resolves once every event posted so far has been delivered
   */
  flush(): Promise<void> {
    if (!this.scheduled && this.buffer.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.flushWaiters.push(resolve);
    });
  }

  private schedule(): void {
    if (this.scheduled) {
      return;
    }
    this.scheduled = true;
    setImmediate(() => this.drain());
  }

  private drain(): void {
    this.scheduled = false;
    const batch = this.buffer;
    this.buffer = [];

    for (const event of batch) {
      try {
        this.deliver(event);
      } catch (error) {
        logger.error('Event consumer failed', { error: describeError(error) });
      }
    }

    // consumers may post while being notified
    if (this.buffer.length > 0) {
      this.schedule();
      return;
    }

    const waiters = this.flushWaiters;
    this.flushWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
