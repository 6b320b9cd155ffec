/**
 * Custom error classes for the storefront
 */

export type ErrorStatus = 400 | 404 | 409 | 500 | 503 | 504;

export class StoreError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: ErrorStatus
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

export class NotFoundError extends StoreError {
  constructor(message = 'Resource not found') {
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends StoreError {
  constructor(message = 'Validation failed') {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

export class CancelledError extends StoreError {
  constructor(message = 'Task cancelled') {
    super(message, 'CANCELLED', 409);
    this.name = 'CancelledError';
  }
}

export class ServiceUnavailableError extends StoreError {
  constructor(message = 'Service is shutting down') {
    super(message, 'SERVICE_UNAVAILABLE', 503);
    this.name = 'ServiceUnavailableError';
  }
}

export class TimeoutError extends StoreError {
  constructor(message = 'Operation timed out') {
    super(message, 'TIMEOUT', 504);
    this.name = 'TimeoutError';
  }
}

/**
 * Error envelope for API responses
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
  };
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof StoreError) {
    return {
      error: {
        code: error.code,
        message: error.message,
      },
    };
  }

  return {
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    },
  };
}
