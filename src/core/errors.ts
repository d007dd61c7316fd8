export class RateLimitError extends Error {
  readonly kind = "rate_limited" as const;

  constructor(message: string, public code: string, public retryAt: number) {
    super(message);
    this.name = "RateLimitError";
  }
}

export class TransportError extends Error {
  readonly kind = "transport" as const;

  constructor(message: string, public code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class StorageError extends Error {
  readonly kind = "storage" as const;

  constructor(message: string, public code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
  }
}

/** Failures a remote page fetch can end in. */
export type FetchError = RateLimitError | TransportError;

/** Every failure that ends a collection run. */
export type CollectionError = RateLimitError | TransportError | StorageError;

export function isFetchError(error: unknown): error is FetchError {
  return error instanceof RateLimitError || error instanceof TransportError;
}

export function isCollectionError(error: unknown): error is CollectionError {
  return isFetchError(error) || error instanceof StorageError;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class SessionStateError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "SessionStateError";
  }
}

export class ChannelClosedError extends Error {
  constructor(message = "Channel receiver is closed") {
    super(message);
    this.name = "ChannelClosedError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
