import { Order, OrderSequence } from '../models/order.js';
import { DEFAULT_CUSTOMER } from '../config/store.js';
import { ValidationError } from '../lib/errors.js';
import { describeError, logger } from '../lib/logger.js';
import { CartService } from './cart.service.js';
import { OrderProcessor } from './order.processor.js';
import { OrderTracker } from './order.tracker.js';

export interface ExpressCheckoutResult {
  order: Order;
  confirmation: string;
}

/**
 * Turns the cart into orders and hands them to the processor
 */
export class CheckoutService {
  constructor(
    private readonly cart: CartService,
    private readonly processor: OrderProcessor,
    private readonly tracker: OrderTracker,
    private readonly sequence: OrderSequence
  ) {}

  /**
   * Submit the cart for background processing. The cart is cleared once the
   * order is queued; progress is reported through the tracker.
   */
  checkout(customerName: string = DEFAULT_CUSTOMER): Order {
    const order = this.createOrder(customerName);

    // observer notifications arrive on a later turn, after track
    this.processor.submit(order);
    this.tracker.track(order);
    this.cart.clear();

    logger.info('Checkout submitted', { orderId: order.orderId, total: order.calculateTotal() });
    return order;
  }

  /**
   * Process the cart and wait for the confirmation line. The cart is left
   * untouched when processing fails or times out.
   */
  async expressCheckout(customerName: string = DEFAULT_CUSTOMER, timeoutMs: number): Promise<ExpressCheckoutResult> {
    const order = this.createOrder(customerName);
    const pending = this.processor.awaitResult(order, timeoutMs);
    this.tracker.track(order);

    let confirmation: string;
    try {
      confirmation = await pending;
    } catch (error) {
      this.tracker.onCompleted(order.orderId, false, describeError(error));
      throw error;
    }

    this.tracker.onCompleted(order.orderId, order.isPaid, confirmation);
    if (order.isPaid) {
      this.cart.clear();
    }

    logger.info('Express checkout finished', { orderId: order.orderId, paid: order.isPaid });
    return { order, confirmation };
  }

  private createOrder(customerName: string): Order {
    if (this.cart.isEmpty()) {
      throw new ValidationError('Your cart is empty!');
    }
    return Order.create(this.sequence, customerName, this.cart.lines());
  }
}
