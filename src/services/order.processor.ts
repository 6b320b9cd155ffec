import { Order } from '../models/order.js';
import { formatAmount } from '../models/catalog.js';
import { ProcessingEvent, ProcessingObserver } from '../models/types.js';
import { CURRENCY, PROCESSING_MESSAGES, PROGRESS_STEPS } from '../config/store.js';
import { EventChannel } from '../lib/channel.js';
import { CancelledError, ServiceUnavailableError, TimeoutError, ValidationError } from '../lib/errors.js';
import { describeError, logger } from '../lib/logger.js';
import { PoolStats, TaskHandle, WorkerPool, sleep } from '../lib/workerPool.js';
import { recordOrderProcessed } from '../telemetry/metrics.js';

export interface OrderProcessorOptions {
  poolSize: number;
  /** Pause before each progress notification */
  stepDelayMs: number;
  /** Single pause used by the awaitable path */
  resultDelayMs: number;
  shutdownGraceMs: number;
}

/**
 * Runs orders in the background on a bounded pool and reports
 * started / progress / completed to the registered observer.
 */
export class OrderProcessor {
  private observer: ProcessingObserver | null = null;
  private readonly pool: WorkerPool;
  private readonly channel: EventChannel<ProcessingEvent>;
  private readonly staged = new Map<number, TaskHandle<void>>();
  private shutdownPromise: Promise<void> | null = null;

  constructor(private readonly options: OrderProcessorOptions) {
    this.pool = new WorkerPool(options.poolSize);
    this.channel = new EventChannel((event) => this.dispatch(event));
  }

  /**
   * Replace the observer; queued notifications go to whichever observer is
   * registered when they are delivered
   */
  setObserver(observer: ProcessingObserver | null): void {
    this.observer = observer;
  }

  /**
   * Queue staged processing for an order and return immediately
   */
  submit(candidate: Order | null | undefined): void {
    const order = this.accept(candidate);

    const handle = this.pool.submit((signal) => this.runStaged(order, signal));
    this.staged.set(order.orderId, handle);

    void handle.result
      .catch((error: unknown) => {
        // dropped before a worker picked it up, or failed outside the staged loop
        logger.warn('Order task ended without running to completion', {
          orderId: order.orderId,
          error: describeError(error),
        });
        const outcome = error instanceof CancelledError || !this.pool.isAccepting ? 'interrupted' : 'failure';
        recordOrderProcessed(outcome, 0);
        this.channel.post({
          type: 'completed',
          orderId: order.orderId,
          success: false,
          message: PROCESSING_MESSAGES[outcome],
        });
      })
      .finally(() => {
        this.staged.delete(order.orderId);
      });

    logger.info('Order submitted', { orderId: order.orderId, items: order.itemCount });
  }

  /**
   * Interrupt a staged order that is queued or running. The observer gets
   * `completed(false, "Processing interrupted!")` and the order stays unpaid.
   * Returns false when the order is not in flight.
   */
  cancel(orderId: number): boolean {
    const handle = this.staged.get(orderId);
    if (!handle) {
      return false;
    }

    logger.info('Cancelling order', { orderId });
    handle.cancel(new CancelledError(`Order #${orderId} cancelled`));
    return true;
  }

  /**
   * Process an order with one longer pause and yield a confirmation line.
   * Does not notify the observer.
   */
  submitForResult(candidate: Order | null | undefined): TaskHandle<string> {
    const order = this.accept(candidate);

    return this.pool.submit(async (signal) => {
      await sleep(this.options.resultDelayMs, signal);

      const success = order.processPayment();
      return success
        ? `Order #${order.orderId} confirmed! Total: ${formatAmount(order.calculateTotal())} ${CURRENCY}`
        : `Order #${order.orderId} failed!`;
    });
  }

  /**
   * Wait for `submitForResult`; cancels the task and rejects with
   * TimeoutError when `timeoutMs` elapses first
   */
  awaitResult(order: Order, timeoutMs: number): Promise<string> {
    const handle = this.submitForResult(order);

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        const error = new TimeoutError(`Timed out waiting for order #${order.orderId}`);
        logger.warn('Order result timed out', { orderId: order.orderId, timeoutMs });
        handle.cancel(error);
        reject(error);
      }, timeoutMs);

      handle.result.then(
        (confirmation) => {
          clearTimeout(timer);
          resolve(confirmation);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }

  stats(): PoolStats {
    return this.pool.stats();
  }

  /**
   * Resolves when no order is running or queued
   */
  onIdle(): Promise<void> {
    return this.pool.onIdle();
  }

  /**
   * Resolves when every notification posted so far has been delivered
   */
  flush(): Promise<void> {
    return this.channel.flush();
  }

  /**
   * Safe to call repeatedly; later calls return the first call's promise
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.stop();
    }
    return this.shutdownPromise;
  }

  private async stop(): Promise<void> {
    logger.info('Shutting down order processor', { ...this.pool.stats() });

    const drained = await this.pool.shutdown(this.options.shutdownGraceMs);
    if (!drained) {
      logger.warn('Order processor forced to stop', { graceMs: this.options.shutdownGraceMs });
    }

    // staged tasks honour the abort signal, so this settles promptly
    await this.pool.onIdle();
    await this.channel.flush();
    logger.info('Order processor shut down', { drained });
  }

  private accept(order: Order | null | undefined): Order {
    if (!order) {
      throw new ValidationError('An order is required');
    }
    if (!this.pool.isAccepting) {
      throw new ServiceUnavailableError('Order processor is shut down');
    }
    return order;
  }

  private async runStaged(order: Order, signal: AbortSignal): Promise<void> {
    const { orderId } = order;
    const startedAt = Date.now();
    const elapsed = () => (Date.now() - startedAt) / 1000;

    this.channel.post({ type: 'started', orderId });
    logger.info('Order processing started', { orderId });

    try {
      for (const percent of PROGRESS_STEPS) {
        await sleep(this.options.stepDelayMs, signal);
        logger.debug('Order progress', { orderId, percent });
        this.channel.post({ type: 'progress', orderId, percent });
      }
    } catch (error) {
      if (!signal.aborted) {
        throw error;
      }
      logger.warn('Order processing interrupted', { orderId, reason: describeError(signal.reason) });
      recordOrderProcessed('interrupted', elapsed());
      this.channel.post({ type: 'completed', orderId, success: false, message: PROCESSING_MESSAGES.interrupted });
      return;
    }

    const success = order.processPayment();
    recordOrderProcessed(success ? 'success' : 'failure', elapsed());
    logger.info('Order processing complete', { orderId, success });

    this.channel.post({
      type: 'completed',
      orderId,
      success,
      message: success ? PROCESSING_MESSAGES.success : PROCESSING_MESSAGES.failure,
    });
  }

  private dispatch(event: ProcessingEvent): void {
    const observer = this.observer;
    if (!observer) {
      return;
    }

    switch (event.type) {
      case 'started':
        observer.onStarted(event.orderId);
        break;
      case 'progress':
        observer.onProgress(event.orderId, event.percent);
        break;
      case 'completed':
        observer.onCompleted(event.orderId, event.success, event.message);
        break;
    }
  }
}
