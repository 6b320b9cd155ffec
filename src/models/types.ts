/**
 * Core domain types for the storefront
 */

export type CatalogKind = 'ELECTRONICS' | 'CLOTHING';

interface CatalogItemBase {
  readonly id: number;
  readonly name: string;
  readonly unitPrice: number;
}

export interface ElectronicsItem extends CatalogItemBase {
  readonly kind: 'ELECTRONICS';
  readonly brand: string;
  readonly warrantyMonths: number;
}

export interface ClothingItem extends CatalogItemBase {
  readonly kind: 'CLOTHING';
  readonly size: string;
  readonly material: string;
}

export type CatalogItem = ElectronicsItem | ClothingItem;

export type ItemOfKind<K extends CatalogKind> = Extract<CatalogItem, { kind: K }>;

export interface CartLine {
  readonly item: CatalogItem;
  readonly quantity: number;
}

export interface CartSnapshot {
  lines: CartLine[];
  total: number;
  itemCount: number;
}

/**
 * Anything that can be totalled and paid for
 */
export interface Payable {
  calculateTotal(): number;
  processPayment(): boolean;
  getPaymentSummary(): string;
}

/**
 * Summary record persisted per processed order
 */
export interface OrderRecord {
  orderId: number;
  customerName: string;
  createdAt: Date;
  total: number;
  paid: boolean;
}

export type ProcessingEvent =
  | { type: 'started'; orderId: number }
  | { type: 'progress'; orderId: number; percent: number }
  | { type: 'completed'; orderId: number; success: boolean; message: string };

export interface ProcessingObserver {
  onStarted(orderId: number): void;
  onProgress(orderId: number, percent: number): void;
  onCompleted(orderId: number, success: boolean, message: string): void;
}

export type OrderState = 'SUBMITTED' | 'STARTED' | 'PROGRESSING' | 'COMPLETED';

export interface OrderStatus {
  orderId: number;
  state: OrderState;
  progress: number;
  success?: boolean;
  message?: string;
}
