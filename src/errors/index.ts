/**
 * Error hierarchy shared by the collector, the store and the HTTP layer.
 * `statusCode` is what the API answers when the error reaches a route.
 */

export class CollectorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode = 500,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CollectorError';
  }
}

export class FetchError extends CollectorError {
  readonly status?: number;

  constructor(
    public readonly url: string,
    message: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super(`Fetch from ${url} failed: ${message}`, 'FETCH_ERROR', 502, options);
    this.name = 'FetchError';
    this.status = options?.status;
  }
}

export class StoreError extends CollectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'STORE_ERROR', 500, options);
    this.name = 'StoreError';
  }
}

export class UnknownMetricError extends CollectorError {
  constructor(
    public readonly metric: string,
    public readonly supported: readonly string[],
  ) {
    super(`Unknown metric: ${metric}. Supported: ${supported.join(', ')}`, 'UNKNOWN_METRIC', 400);
    this.name = 'UnknownMetricError';
  }
}

export class NoDataError extends CollectorError {
  constructor(message = 'No data available') {
    super(message, 'NO_DATA', 404);
    this.name = 'NoDataError';
  }
}

export class ConfigError extends CollectorError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', 400);
    this.name = 'ConfigError';
  }
}

export class NotFoundError extends CollectorError {
  constructor(
    public readonly entity: string,
    public readonly id: string,
  ) {
    super(`${entity} ${id} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export const describeError = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
