import type { Context } from 'hono';
import { StoreError, ValidationError, toErrorResponse } from './errors.js';
import { describeError, logger } from './logger.js';

/**
 * Helper to return JSON error responses with proper status codes
 */
export function jsonError(c: Context, error: unknown) {
  const response = toErrorResponse(error);
  if (error instanceof StoreError) {
    return c.json(response, error.statusCode);
  }

  logger.error('Unhandled request error', {
    method: c.req.method,
    path: c.req.path,
    error: describeError(error),
  });
  return c.json(response, 500);
}

/**
 * Parse an optional JSON body; an empty body reads as undefined
 */
export async function readJsonBody(c: Context): Promise<unknown> {
  const text = await c.req.text();
  if (text.trim() === '') {
    return undefined;
  }

  try {
    const body: unknown = JSON.parse(text);
    return body;
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
}
