import { ValidationError } from './errors.js';
import { isCatalogKind } from '../models/catalog.js';
import { CatalogKind } from '../models/types.js';

const MAX_CUSTOMER_NAME_LENGTH = 100;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a positive integer id taken from a path or body
 */
export function validateId(raw: unknown, field = 'id'): number {
  const value = typeof raw === 'string' && /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : raw;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${field} must be a positive integer`);
  }
  return value;
}

/**
 * Customer names end up in a CSV record, so line breaks and commas are refused
 */
export function validateCustomerName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length > MAX_CUSTOMER_NAME_LENGTH) {
    throw new ValidationError(`customerName must be at most ${MAX_CUSTOMER_NAME_LENGTH} characters`);
  }
  if (/[,\r\n]/.test(trimmed)) {
    throw new ValidationError('customerName must not contain commas or line breaks');
  }
  return trimmed;
}

export function validateKind(raw: string): CatalogKind {
  const kind = raw.trim().toUpperCase();
  if (!isCatalogKind(kind)) {
    throw new ValidationError('kind must be ELECTRONICS or CLOTHING');
  }
  return kind;
}

/**
 * Validate an inclusive price range; either bound may be omitted
 */
export function validatePriceRange(
  rawMin: string | undefined,
  rawMax: string | undefined
): { min: number; max: number } {
  const min = rawMin === undefined ? 0 : Number(rawMin);
  const max = rawMax === undefined ? Number.POSITIVE_INFINITY : Number(rawMax);

  if (Number.isNaN(min) || Number.isNaN(max) || min < 0 || max < 0) {
    throw new ValidationError('min and max must be non-negative numbers');
  }
  if (min > max) {
    throw new ValidationError('min must not exceed max');
  }
  return { min, max };
}

/**
 * Validate add item request
 */
export function validateAddItemRequest(body: unknown): { productId: number } {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be an object');
  }

  return { productId: validateId(body.productId, 'productId') };
}

/**
 * Validate checkout request; the body and its name are optional
 */
export function validateCheckoutRequest(body: unknown): { customerName?: string } {
  if (body === undefined || body === null) {
    return {};
  }
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be an object');
  }

  const { customerName } = body;
  if (customerName === undefined) {
    return {};
  }
  if (typeof customerName !== 'string') {
    throw new ValidationError('customerName must be a string');
  }

  const name = validateCustomerName(customerName);
  return name === '' ? {} : { customerName: name };
}
