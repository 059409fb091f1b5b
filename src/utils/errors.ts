export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'An unknown error occurred';
}

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code?: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} with id '${id}' not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/**
 * The upstream search request failed. `transient` is true for failures a
 * retry may fix (network, timeout, rate limit, 5xx).
 */
export class SourceError extends AppError {
  constructor(
    message: string,
    public readonly transient: boolean,
    public readonly sourceId?: string,
  ) {
    super(message, 502, 'SOURCE_ERROR');
    this.name = 'SourceError';
  }
}

/** A single raw record lacks the minimum identity fields; it is dropped, never retried. */
export class MalformedRecordError extends AppError {
  constructor(message: string) {
    super(message, 422, 'MALFORMED_RECORD');
    this.name = 'MalformedRecordError';
  }
}

export class StoreError extends AppError {
  constructor(message: string) {
    super(message, 500, 'STORE_ERROR');
    this.name = 'StoreError';
  }
}

export function isTransientSourceError(error: unknown): boolean {
  return error instanceof SourceError && error.transient;
}
