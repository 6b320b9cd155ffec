import { Hono } from 'hono';
import { CsvFileStore } from '../clients/csvFileStore.js';
import { CheckoutService } from '../services/checkout.service.js';
import { OrderTracker, TrackedOrder } from '../services/order.tracker.js';
import { formatTimestamp, serializeOrder } from '../models/order.js';
import { OrderRecord } from '../models/types.js';
import { NotFoundError } from '../lib/errors.js';
import { jsonError, readJsonBody } from '../lib/http.js';
import { validateCheckoutRequest, validateId } from '../lib/validation.js';

export interface OrderRouteDeps {
  checkout: CheckoutService;
  tracker: OrderTracker;
  store: CsvFileStore;
  resultTimeoutMs: number;
}

function toTrackedView({ order, status }: TrackedOrder) {
  return { order: serializeOrder(order), status };
}

function toHistoryView(record: OrderRecord) {
  return {
    orderId: record.orderId,
    customerName: record.customerName,
    createdAt: formatTimestamp(record.createdAt),
    total: record.total,
    paid: record.paid,
  };
}

/**
 * Create order routes
 */
export function createOrderRoutes({ checkout, tracker, store, resultTimeoutMs }: OrderRouteDeps): Hono {
  const app = new Hono();

  /**
   * POST /orders - Check out the cart for background processing
   */
  app.post('/', async (c) => {
    try {
      const { customerName } = validateCheckoutRequest(await readJsonBody(c));
      const order = checkout.checkout(customerName);
      return c.json(toTrackedView(tracker.get(order.orderId)), 202);
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * POST /orders/express - Check out and wait for the confirmation
   */
  app.post('/express', async (c) => {
    try {
      const { customerName } = validateCheckoutRequest(await readJsonBody(c));
      const { order, confirmation } = await checkout.expressCheckout(customerName, resultTimeoutMs);
      return c.json({ order: serializeOrder(order), confirmation });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * GET /orders - Orders placed since startup plus the persisted history
   */
  app.get('/', async (c) => {
    try {
      const history = await store.loadOrderRecords();
      return c.json({
        orders: tracker.list().map(toTrackedView),
        history: history.map(toHistoryView),
      });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * GET /orders/:id - Order with its processing status
   */
  app.get('/:id', async (c) => {
    try {
      const id = validateId(c.req.param('id'));
      if (tracker.has(id)) {
        return c.json(toTrackedView(tracker.get(id)));
      }

      // earlier runs only left a summary record behind
      const record = (await store.loadOrderRecords()).find((entry) => entry.orderId === id);
      if (!record) {
        throw new NotFoundError(`Order ${id} not found`);
      }
      return c.json({ order: toHistoryView(record), status: null });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * GET /orders/:id/receipt - Plain-text payment summary
   */
  app.get('/:id/receipt', (c) => {
    try {
      const { order } = tracker.get(validateId(c.req.param('id')));
      return c.text(order.getPaymentSummary());
    } catch (error) {
      return jsonError(c, error);
    }
  });

  return app;
}
