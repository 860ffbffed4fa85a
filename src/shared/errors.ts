export class CrawlerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CrawlerError';
  }
}

export class ConfigurationError extends CrawlerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Timeouts, connection failures, 5xx and 429 responses. Retried by the fetch client.
 */
export class TransientFetchError extends CrawlerError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    details?: Record<string, unknown>,
  ) {
    super(message, 'TRANSIENT_FETCH_ERROR', { url, status, ...details });
    this.name = 'TransientFetchError';
  }
}

/**
 * 4xx other than 429, or a URL that cannot be requested. Never retried.
 */
export class PermanentFetchError extends CrawlerError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    details?: Record<string, unknown>,
  ) {
    super(message, 'PERMANENT_FETCH_ERROR', { url, status, ...details });
    this.name = 'PermanentFetchError';
  }
}

export class ValidationError extends CrawlerError {
  constructor(
    public readonly field: string,
    public readonly reason: string,
    details?: Record<string, unknown>,
  ) {
    super(`Invalid ${field}: ${reason}`, 'VALIDATION_ERROR', { field, reason, ...details });
    this.name = 'ValidationError';
  }
}

export class PaginationCycleError extends CrawlerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PAGINATION_CYCLE', details);
    this.name = 'PaginationCycleError';
  }
}

export class StorageError extends CrawlerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STORAGE_ERROR', details);
    this.name = 'StorageError';
  }
}

export class RunCancelledError extends CrawlerError {
  constructor(message = 'Run cancelled', details?: Record<string, unknown>) {
    super(message, 'RUN_CANCELLED', details);
    this.name = 'RunCancelledError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string {
  return err instanceof CrawlerError ? err.code : 'UNKNOWN_ERROR';
}
