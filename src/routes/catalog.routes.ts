import { Hono } from 'hono';
import { CatalogService } from '../services/catalog.service.js';
import { describeItem } from '../models/catalog.js';
import { CatalogItem } from '../models/types.js';
import { jsonError } from '../lib/http.js';
import { validateId, validateKind } from '../lib/validation.js';

function toProductView(item: CatalogItem) {
  return { ...item, description: describeItem(item) };
}

/**
 * Create catalog routes
 */
export function createCatalogRoutes(catalog: CatalogService): Hono {
  const app = new Hono();

  /**
   * GET /products - List products, optionally by kind and name
   */
  app.get('/', (c) => {
    try {
      const rawKind = c.req.query('kind');
      const kind = rawKind === undefined ? undefined : validateKind(rawKind);
      const products = catalog.list({ kind, term: c.req.query('q') });
      return c.json({ products: products.map(toProductView) });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * GET /products/:id - Get one product
   */
  app.get('/:id', (c) => {
    try {
      const id = validateId(c.req.param('id'));
      return c.json({ product: toProductView(catalog.get(id)) });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  return app;
}
