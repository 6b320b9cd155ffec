/**
 * Fixed storefront constants
 */

export const CURRENCY = 'DH';

export const DEFAULT_CUSTOMER = 'Customer';

/** First issued order id is ORDER_ID_SEED + 1 */
export const ORDER_ID_SEED = 1000;

export const PROGRESS_STEPS = [0, 20, 40, 60, 80, 100] as const;

export const PROCESSING_MESSAGES = {
  success: 'Order processed successfully!',
  failure: 'Payment failed!',
  interrupted: 'Processing interrupted!',
} as const;
