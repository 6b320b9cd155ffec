import { CancelledError, ServiceUnavailableError, ValidationError } from './errors.js';

export type Task<T> = (signal: AbortSignal) => Promise<T>;

export interface TaskHandle<T> {
  readonly result: Promise<T>;
  cancel(reason?: Error): void;
}

export interface PoolStats {
  active: number;
  queued: number;
  peakActive: number;
}

interface PoolEntry {
  readonly controller: AbortController;
  run(): Promise<void>;
  drop(reason: Error): void;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new CancelledError();
}

/**
 * Wait `ms`, rejecting early when `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      if (signal) {
        reject(abortReason(signal));
      }
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Fixed-size task runner with a FIFO queue
 */
export class WorkerPool {
  private readonly queue: PoolEntry[] = [];
  private readonly running = new Set<PoolEntry>();
  private idleWaiters: Array<() => void> = [];
  private accepting = true;
  private peakActive = 0;
  private shutdownPromise: Promise<boolean> | null = null;

  constructor(private readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new ValidationError('Pool size must be an integer >= 1');
    }
  }

  get isAccepting(): boolean {
    return this.accepting;
  }

  /**
   * Queue a task; it starts as soon as a worker is free
   */
  submit<T>(task: Task<T>): TaskHandle<T> {
    if (!this.accepting) {
      throw new ServiceUnavailableError('Worker pool is shut down');
    }

    const controller = new AbortController();
    let settle: { resolve: (value: T) => void; reject: (reason: unknown) => void } | null = null;
    const result = new Promise<T>((resolve, reject) => {
      settle = { resolve, reject };
    });

    const entry: PoolEntry = {
      controller,
      run: async () => {
        try {
          const value = await task(controller.signal);
          settle?.resolve(value);
        } catch (error) {
          settle?.reject(error);
        }
      },
      drop: (reason) => {
        settle?.reject(reason);
      },
    };

    this.queue.push(entry);
    this.pump();

    return {
      result,
      cancel: (reason = new CancelledError()) => this.cancel(entry, reason),
    };
  }

  stats(): PoolStats {
    return {
      active: this.running.size,
      queued: this.queue.length,
      peakActive: this.peakActive,
    };
  }

  /**
   * Resolves once nothing is running or queued
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop accepting work, wait up to `graceMs`, then abort whatever is left.
   * Resolves to true when the pool drained on its own. Repeated calls share
   * the first call's result.
   */
  shutdown(graceMs: number): Promise<boolean> {
    if (!this.shutdownPromise) {
      this.accepting = false;
      this.shutdownPromise = this.drain(graceMs);
    }
    return this.shutdownPromise;
  }

  private async drain(graceMs: number): Promise<boolean> {
    const timer = new AbortController();
    const drained = await Promise.race([
      this.onIdle().then(() => true),
      sleep(graceMs, timer.signal).then(
        () => false,
        () => true
      ),
    ]);
    timer.abort();

    if (!drained) {
      this.forceStop(new ServiceUnavailableError('Worker pool was shut down'));
    }
    return drained;
  }

  private forceStop(reason: Error): void {
    for (const entry of this.queue.splice(0)) {
      entry.drop(reason);
    }
    for (const entry of this.running) {
      entry.controller.abort(reason);
    }
    this.notifyIfIdle();
  }

  private cancel(entry: PoolEntry, reason: Error): void {
    const index = this.queue.indexOf(entry);
    if (index >= 0) {
      this.queue.splice(index, 1);
      entry.drop(reason);
      this.notifyIfIdle();
      return;
    }

    if (this.running.has(entry)) {
      entry.controller.abort(reason);
    }
  }

  private pump(): void {
    while (this.running.size < this.size && this.queue.length > 0) {
      const entry = this.queue.shift();
      if (!entry) {
        break;
      }

      this.running.add(entry);
      this.peakActive = Math.max(this.peakActive, this.running.size);

      void entry.run().finally(() => {
        this.running.delete(entry);
        this.pump();
        this.notifyIfIdle();
      });
    }
  }

  private isIdle(): boolean {
    return this.running.size === 0 && this.queue.length === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
