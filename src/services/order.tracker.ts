import { Order } from '../models/order.js';
import { OrderStatus, ProcessingObserver } from '../models/types.js';
import { NotFoundError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

/**
 * Where successfully processed orders are recorded
 */
export interface OrderArchive {
  appendOrder(order: Order): Promise<boolean>;
}

export interface TrackedOrder {
  order: Order;
  status: OrderStatus;
}

/**
 * Processor observer that keeps per-order status for the API and records
 * successful orders in the archive
 */
export class OrderTracker implements ProcessingObserver {
  private readonly tracked = new Map<number, TrackedOrder>();
  private readonly pendingWrites = new Set<Promise<void>>();
  private failedWrites = 0;

  constructor(private readonly store: OrderArchive) {}

  track(order: Order): void {
    this.tracked.set(order.orderId, {
      order,
      status: { orderId: order.orderId, state: 'SUBMITTED', progress: 0 },
    });
  }

  get(orderId: number): TrackedOrder {
    const entry = this.tracked.get(orderId);
    if (!entry) {
      throw new NotFoundError(`Order ${orderId} not found`);
    }
    return { order: entry.order, status: { ...entry.status } };
  }

  has(orderId: number): boolean {
    return this.tracked.has(orderId);
  }

  list(): TrackedOrder[] {
    return [...this.tracked.values()].map(({ order, status }) => ({ order, status: { ...status } }));
  }

  get archiveFailures(): number {
    return this.failedWrites;
  }

  onStarted(orderId: number): void {
    this.update(orderId, { state: 'STARTED', progress: 0 });
  }

  onProgress(orderId: number, percent: number): void {
    this.update(orderId, { state: 'PROGRESSING', progress: percent });
  }

  onCompleted(orderId: number, success: boolean, message: string): void {
    const entry = this.update(orderId, {
      state: 'COMPLETED',
      progress: success ? 100 : undefined,
      success,
      message,
    });

    if (entry && success) {
      this.persist(entry.order);
    }
  }

  /**
   * Resolves once every archive write started so far has finished
   */
  async settled(): Promise<void> {
    await Promise.all([...this.pendingWrites]);
  }

  private update(orderId: number, patch: Partial<Omit<OrderStatus, 'orderId'>>): TrackedOrder | undefined {
    const entry = this.tracked.get(orderId);
    if (!entry) {
      logger.warn('Notification for untracked order', { orderId });
      return undefined;
    }

    const status: OrderStatus = { ...entry.status };
    if (patch.state !== undefined) status.state = patch.state;
    if (patch.progress !== undefined) status.progress = patch.progress;
    if (patch.success !== undefined) status.success = patch.success;
    if (patch.message !== undefined) status.message = patch.message;

    entry.status = status;
    return entry;
  }

  private persist(order: Order): void {
    const write = this.persistOrder(order).finally(() => {
      this.pendingWrites.delete(write);
    });
    this.pendingWrites.add(write);
  }

  private async persistOrder(order: Order): Promise<void> {
    // a failed write never rolls back the payment
    const saved = await this.store.appendOrder(order);
    if (!saved) {
      this.failedWrites += 1;
      logger.warn('Processed order was not saved', { orderId: order.orderId });
    }
  }
}
