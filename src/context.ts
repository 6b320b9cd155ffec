import { Settings } from './config/settings.js';
import { SAMPLE_CATALOG } from './config/sampleCatalog.js';
import { CsvFileStore } from './clients/csvFileStore.js';
import { OrderSequence } from './models/order.js';
import { CartService } from './services/cart.service.js';
import { CatalogService } from './services/catalog.service.js';
import { CheckoutService } from './services/checkout.service.js';
import { OrderProcessor } from './services/order.processor.js';
import { OrderTracker } from './services/order.tracker.js';
import { logger } from './lib/logger.js';

/**
 * Everything the routes need, built once per process
 */
export interface AppContext {
  settings: Settings;
  store: CsvFileStore;
  catalog: CatalogService;
  cart: CartService;
  sequence: OrderSequence;
  processor: OrderProcessor;
  tracker: OrderTracker;
  checkout: CheckoutService;
}

export async function createAppContext(settings: Settings): Promise<AppContext> {
  const store = new CsvFileStore(settings.dataDir);
  const catalog = new CatalogService(await store.ensureCatalog(SAMPLE_CATALOG));

  const sequence = new OrderSequence();
  for (const record of await store.loadOrderRecords()) {
    sequence.advancePast(record.orderId);
  }

  const processor = new OrderProcessor({
    poolSize: settings.workerPoolSize,
    stepDelayMs: settings.stepDelayMs,
    resultDelayMs: settings.resultDelayMs,
    shutdownGraceMs: settings.shutdownGraceMs,
  });
  const tracker = new OrderTracker(store);
  processor.setObserver(tracker);

  const cart = new CartService();
  const checkout = new CheckoutService(cart, processor, tracker, sequence);

  logger.info('Application context ready', {
    products: catalog.size(),
    nextOrderId: sequence.peek() + 1,
    workerPoolSize: settings.workerPoolSize,
  });

  return { settings, store, catalog, cart, sequence, processor, tracker, checkout };
}

/**
 * Stop processing, then wait for in-flight order writes
 */
export async function closeAppContext(ctx: AppContext): Promise<void> {
  await ctx.processor.shutdown();
  await ctx.tracker.settled();
  ctx.processor.setObserver(null);
}
