import { Hono } from 'hono';
import { AppContext } from './context.js';
import { jsonError } from './lib/http.js';
import { createCatalogRoutes } from './routes/catalog.routes.js';
import { createCartRoutes } from './routes/cart.routes.js';
import { createOrderRoutes } from './routes/order.routes.js';

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  // Health check
  app.get('/health', (c) => {
    return c.json({ status: 'ok', workers: ctx.processor.stats() });
  });

  app.route('/products', createCatalogRoutes(ctx.catalog));
  app.route('/cart', createCartRoutes(ctx.cart, ctx.catalog));
  app.route(
    '/orders',
    createOrderRoutes({
      checkout: ctx.checkout,
      tracker: ctx.tracker,
      store: ctx.store,
      resultTimeoutMs: ctx.settings.resultTimeoutMs,
    })
  );

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Route not found',
        },
      },
      404
    );
  });

  app.onError((error, c) => jsonError(c, error));

  return app;
}
