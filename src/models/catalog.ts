import { CatalogItem, CatalogKind, ClothingItem, ElectronicsItem, ItemOfKind } from './types.js';
import { CURRENCY } from '../config/store.js';
import { ValidationError } from '../lib/errors.js';

export const CATALOG_KINDS: readonly CatalogKind[] = ['ELECTRONICS', 'CLOTHING'];

export function isCatalogKind(value: string): value is CatalogKind {
  return CATALOG_KINDS.some((kind) => kind === value);
}

/**
 * Type guard factory for filtering items down to one kind
 */
export function isKind<K extends CatalogKind>(kind: K) {
  return (item: CatalogItem): item is ItemOfKind<K> => item.kind === kind;
}

/**
 * Format an amount to two decimals
 */
export function formatAmount(amount: number): string {
  return amount.toFixed(2);
}

function validateBase(id: number, name: string, unitPrice: number): void {
  if (!Number.isInteger(id) || id < 1) {
    throw new ValidationError('Item id must be a positive integer');
  }
  if (name.trim().length === 0) {
    throw new ValidationError('Item name must be non-empty');
  }
  if (!Number.isFinite(unitPrice) || unitPrice < 0) {
    throw new ValidationError('Unit price must be a non-negative number');
  }
}

export function createElectronics(
  id: number,
  name: string,
  unitPrice: number,
  brand: string,
  warrantyMonths: number
): ElectronicsItem {
  validateBase(id, name, unitPrice);
  if (!Number.isInteger(warrantyMonths) || warrantyMonths < 0) {
    throw new ValidationError('Warranty months must be a non-negative integer');
  }

  return { kind: 'ELECTRONICS', id, name, unitPrice, brand, warrantyMonths };
}

export function createClothing(
  id: number,
  name: string,
  unitPrice: number,
  size: string,
  material: string
): ClothingItem {
  validateBase(id, name, unitPrice);
  return { kind: 'CLOTHING', id, name, unitPrice, size, material };
}

/**
 * Return a copy of the item with a new unit price
 */
export function withUnitPrice<T extends CatalogItem>(item: T, unitPrice: number): T {
  validateBase(item.id, item.name, unitPrice);
  return { ...item, unitPrice };
}

export function kindLabel(kind: CatalogKind): string {
  switch (kind) {
    case 'ELECTRONICS':
      return 'Electronics';
    case 'CLOTHING':
      return 'Clothing';
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}

/**
 * Long, kind-specific description for catalog listings
 */
export function describeItem(item: CatalogItem): string {
  const price = `${formatAmount(item.unitPrice)} ${CURRENCY}`;

  switch (item.kind) {
    case 'ELECTRONICS':
      return `${kindLabel(item.kind)}: ${item.name} by ${item.brand} | Price: ${price} | Warranty: ${item.warrantyMonths} months`;
    case 'CLOTHING':
      return `${kindLabel(item.kind)}: ${item.name} | Size: ${item.size} | Material: ${item.material} | Price: ${price}`;
    default: {
      const unreachable: never = item;
      return unreachable;
    }
  }
}

/**
 * One-line label used in receipts and cart listings
 */
export function itemLabel(item: CatalogItem): string {
  const price = `${formatAmount(item.unitPrice)} ${CURRENCY}`;

  switch (item.kind) {
    case 'ELECTRONICS':
      return `[${kindLabel(item.kind)}] ${item.name} (${item.brand}) - ${price}`;
    case 'CLOTHING':
      return `[${kindLabel(item.kind)}] ${item.name} (Size: ${item.size}) - ${price}`;
    default: {
      const unreachable: never = item;
      return unreachable;
    }
  }
}
