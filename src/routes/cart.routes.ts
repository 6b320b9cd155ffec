import { Hono } from 'hono';
import { CartService } from '../services/cart.service.js';
import { CatalogService } from '../services/catalog.service.js';
import { CatalogItem } from '../models/types.js';
import { itemLabel } from '../models/catalog.js';
import { jsonError, readJsonBody } from '../lib/http.js';
import {
  validateAddItemRequest,
  validateId,
  validateKind,
  validatePriceRange,
} from '../lib/validation.js';

function toCartView(cart: CartService) {
  const { lines, total, itemCount } = cart.snapshot();
  return {
    lines: lines.map(({ item, quantity }) => ({
      item,
      quantity,
      label: itemLabel(item),
      subtotal: item.unitPrice * quantity,
    })),
    total,
    itemCount,
  };
}

/**
 * Create cart routes
 */
export function createCartRoutes(cart: CartService, catalog: CatalogService): Hono {
  const app = new Hono();

  /**
   * GET /cart - Current cart with totals
   */
  app.get('/', (c) => {
    return c.json({ cart: toCartView(cart) });
  });

  /**
   * GET /cart/items - Distinct cart items, filtered by kind, name or price
   */
  app.get('/items', (c) => {
    try {
      const kind = c.req.query('kind');
      const term = c.req.query('q');
      const min = c.req.query('min');
      const max = c.req.query('max');

      let items: CatalogItem[];
      if (kind !== undefined) {
        items = cart.itemsOfKind(validateKind(kind));
      } else if (term !== undefined) {
        items = cart.search(term);
      } else if (min !== undefined || max !== undefined) {
        const range = validatePriceRange(min, max);
        items = cart.itemsInPriceRange(range.min, range.max);
      } else {
        items = cart.lines().map((line) => line.item);
      }

      return c.json({ items });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * POST /cart/items - Add one unit of a product
   */
  app.post('/items', async (c) => {
    try {
      const { productId } = validateAddItemRequest(await readJsonBody(c));
      cart.addItem(catalog.get(productId));
      return c.json({ cart: toCartView(cart) });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * POST /cart/items/:productId/decrease - Take one unit off a line
   */
  app.post('/items/:productId/decrease', (c) => {
    try {
      cart.decreaseQuantity(validateId(c.req.param('productId'), 'productId'));
      return c.json({ cart: toCartView(cart) });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * DELETE /cart/items/:productId - Remove a line
   */
  app.delete('/items/:productId', (c) => {
    try {
      cart.removeItem(validateId(c.req.param('productId'), 'productId'));
      return c.json({ cart: toCartView(cart) });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * DELETE /cart - Empty the cart
   */
  app.delete('/', (c) => {
    cart.clear();
    return c.json({ cart: toCartView(cart) });
  });

  return app;
}
