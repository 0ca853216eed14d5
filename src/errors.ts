export class EconopsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EconopsError';
  }
}

/** Missing or unusable client settings, raised before any request is made. */
export class ConfigurationError extends EconopsError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class SerializationError extends EconopsError {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(`${message} at ${path}`);
    this.name = 'SerializationError';
  }
}

export class NetworkError extends EconopsError {
  constructor(
    readonly url: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Request to ${url} failed: ${reason}`, { cause });
    this.name = 'NetworkError';
  }
}

/**
 * Failure inside a cache store. Stores return it inside a result instead of
 * throwing; only `EconopsClient.clearCache` rethrows it.
 */
export class CacheError extends EconopsError {
  constructor(
    readonly operation: 'get' | 'put' | 'clear' | 'stats',
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Cache ${operation} failed: ${message}`, options);
    this.name = 'CacheError';
  }
}
