import { CartLine, CatalogItem, OrderRecord, Payable } from './types.js';
import { formatAmount, itemLabel } from './catalog.js';
import { CURRENCY, DEFAULT_CUSTOMER, ORDER_ID_SEED } from '../config/store.js';
import { logger } from '../lib/logger.js';

/**
 * Single-writer source of order ids
 */
export class OrderSequence {
  private current: number;

  constructor(seed: number = ORDER_ID_SEED) {
    this.current = seed;
  }

  next(): number {
    this.current += 1;
    return this.current;
  }

  /**
   * Make sure future ids are greater than `orderId`
   */
  advancePast(orderId: number): void {
    if (orderId > this.current) {
      this.current = orderId;
    }
  }

  peek(): number {
    return this.current;
  }
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time `yyyy-MM-dd HH:mm[:ss]`
 */
export function formatTimestamp(date: Date, withSeconds = true): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}`;
  return withSeconds ? `${day} ${time}:${pad(date.getSeconds())}` : `${day} ${time}`;
}

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Parse a `yyyy-MM-dd HH:mm:ss` local timestamp, or null when malformed
 */
export function parseTimestamp(value: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day, hours, minutes, seconds] = match.map(Number);
  const date = new Date(year, month - 1, day, hours, minutes, seconds);

  // Date rolls 2024-02-31 over into March
  const exact =
    date.getFullYear() === year &&
    date.getMonth() === month - 1 &&
    date.getDate() === day &&
    date.getHours() === hours &&
    date.getMinutes() === minutes &&
    date.getSeconds() === seconds;
  return exact ? date : null;
}

/**
 * Checkout snapshot of the cart with a one-way payment flag
 */
export class Order implements Payable {
  private readonly lineItems: CatalogItem[];
  private paid: boolean;

  private constructor(
    readonly orderId: number,
    readonly customerName: string,
    readonly createdAt: Date,
    lineItems: CatalogItem[],
    paid: boolean
  ) {
    this.lineItems = lineItems;
    this.paid = paid;
  }

  /**
   * Build an order from cart lines, one entry per unit
   */
  static create(
    sequence: OrderSequence,
    customerName: string = DEFAULT_CUSTOMER,
    lines: readonly CartLine[] = []
  ): Order {
    const items: CatalogItem[] = [];
    for (const line of lines) {
      for (let unit = 0; unit < line.quantity; unit++) {
        items.push(line.item);
      }
    }

    const name = customerName.trim() || DEFAULT_CUSTOMER;
    return new Order(sequence.next(), name, new Date(), items, false);
  }

  /**
   * Rebuild a history entry; persisted orders carry no line items
   */
  static restore(record: OrderRecord): Order {
    return new Order(record.orderId, record.customerName, record.createdAt, [], record.paid);
  }

  get items(): CatalogItem[] {
    return [...this.lineItems];
  }

  get itemCount(): number {
    return this.lineItems.length;
  }

  get isPaid(): boolean {
    return this.paid;
  }

  get formattedDate(): string {
    return formatTimestamp(this.createdAt);
  }

  calculateTotal(): number {
    return this.lineItems.reduce((sum, item) => sum + item.unitPrice, 0);
  }

  /**
   * Returns false for an empty order. Paying twice is a no-op success.
   */
  processPayment(): boolean {
    if (this.lineItems.length === 0) {
      logger.warn('Cannot process payment: order is empty', { orderId: this.orderId });
      return false;
    }

    if (this.paid) {
      logger.debug('Order already paid', { orderId: this.orderId });
      return true;
    }

    this.paid = true;
    logger.info('Payment processed', {
      orderId: this.orderId,
      total: formatAmount(this.calculateTotal()),
    });
    return true;
  }

  getPaymentSummary(): string {
    const lines = [
      '========== ORDER SUMMARY ==========',
      `Order ID: ${this.orderId}`,
      `Customer: ${this.customerName}`,
      `Date: ${formatTimestamp(this.createdAt, false)}`,
      '-----------------------------------',
      'Items:',
      ...this.lineItems.map((item) => `  - ${itemLabel(item)}`),
      '-----------------------------------',
      `Total: ${formatAmount(this.calculateTotal())} ${CURRENCY}`,
      `Status: ${this.paid ? 'PAID' : 'PENDING'}`,
      '===================================',
    ];
    return `${lines.join('\n')}\n`;
  }

  toString(): string {
    return `Order #${this.orderId} - ${this.customerName} - ${formatAmount(this.calculateTotal())} ${CURRENCY} - ${
      this.paid ? 'PAID' : 'PENDING'
    }`;
  }
}

export interface OrderView {
  orderId: number;
  customerName: string;
  createdAt: string;
  items: CatalogItem[];
  itemCount: number;
  total: number;
  paid: boolean;
}

export function serializeOrder(order: Order): OrderView {
  return {
    orderId: order.orderId,
    customerName: order.customerName,
    createdAt: order.formattedDate,
    items: order.items,
    itemCount: order.itemCount,
    total: order.calculateTotal(),
    paid: order.isPaid,
  };
}
