/**
 * Custom metrics for order processing and file storage
 * Instruments are no-ops until an OpenTelemetry SDK registers a meter provider
 */

import { metrics, type Counter, type Histogram } from '@opentelemetry/api';

const meter = metrics.getMeter('storefront-orders');

export const ordersProcessedTotal: Counter = meter.createCounter('orders_processed_total', {
  description: 'Orders that reached a terminal processing state, by outcome',
  unit: '1',
});

export const orderProcessingDuration: Histogram = meter.createHistogram('order_processing_duration_seconds', {
  description: 'Time from task start to terminal state',
  unit: 's',
});

export const storeOperationsTotal: Counter = meter.createCounter('store_operations_total', {
  description: 'CSV store operations by operation and status',
  unit: '1',
});

/**
 * Record a processed order with its outcome (`success`, `failure`, `interrupted`)
 */
export function recordOrderProcessed(outcome: string, durationSeconds: number): void {
  ordersProcessedTotal.add(1, { outcome });
  orderProcessingDuration.record(durationSeconds, { outcome });
}

export function recordStoreOperation(operation: string, status: 'success' | 'error'): void {
  storeOperationsTotal.add(1, { operation, status });
}
